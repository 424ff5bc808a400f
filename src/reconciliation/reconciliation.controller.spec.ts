import { BadRequestException, UnprocessableEntityException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { Readable } from 'stream';
import { APP_CONFIG, loadAppConfig } from '../config/app.config';
import { InventoryLoaderService } from '../inventory/inventory-loader.service';
import { BoxHeroService } from '../services/boxhero.service';
import { CsvService } from '../services/csv.service';
import { ReconciliationController } from './reconciliation.controller';
import { NoInventoryError } from './reconciliation.errors';
import { ReconciliationRunner } from './reconciliation.runner';
import { ReconciliationService } from './reconciliation.service';

function uploaded(fieldname: string, originalname: string, content: string): Express.Multer.File {
  const buffer = Buffer.from(content, 'utf-8');
  return {
    fieldname,
    originalname,
    encoding: '7bit',
    mimetype: 'application/octet-stream',
    size: buffer.length,
    buffer,
    stream: Readable.from([]),
    destination: '',
    filename: originalname,
    path: '',
  };
}

describe('ReconciliationController', () => {
  let controller: ReconciliationController;
  let loader: InventoryLoaderService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      controllers: [ReconciliationController],
      providers: [
        { provide: APP_CONFIG, useValue: loadAppConfig({ BOXHERO_API_TOKEN: 'test-token' }) },
        BoxHeroService,
        InventoryLoaderService,
        CsvService,
        ReconciliationService,
        ReconciliationRunner,
      ],
    }).compile();

    controller = moduleRef.get(ReconciliationController);
    loader = moduleRef.get(InventoryLoaderService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('serves the upload page and its script', () => {
    expect(controller.getUploadUi()).toContain('<script src="/reconciliation/upload-ui.js"></script>');
    expect(controller.getUploadUiScript()).toContain("fetch('/reconciliation/run'");
  });

  it('returns the partitions with their csv text', async () => {
    const response = await controller.run({
      orders: [
        uploaded('orders', 'labels.csv', 'order_id,custom_label\nA1,[a]/[b] 100*2\nA2,[a]/[b] 100*2'),
      ],
      inventory: [uploaded('inventory', 'items.json', '[{"barcode": "100", "quantity": 3, "sku": "SKU-1"}]')],
    });

    expect(response.summary).toEqual({ total: 2, fulfillable: 1, unfulfillable: 1, misc: 0 });
    expect(response.headers).toEqual(['order_id', 'custom_label']);
    expect(response.csv).toEqual({
      fulfillable: 'order_id,custom_label,sku_qty\nA1,[a]/[b] 100*2,SKU-1*2',
      unfulfillable: 'order_id,custom_label\nA2,[a]/[b] 100*2',
      misc: 'order_id,custom_label',
    });
  });

  it('passes location ids through to the inventory fetch', async () => {
    jest.spyOn(loader, 'fetchFromApi').mockResolvedValue([{ barcode: '100', quantity: 1 }]);

    await controller.run(
      { orders: [uploaded('orders', 'labels.csv', 'order_id,custom_label\nA1,[a]/[b] 100*1')] },
      { locationIds: '12, 34' },
    );

    expect(loader.fetchFromApi).toHaveBeenCalledWith(['12', '34']);
  });

  it('rejects a request without an orders file', async () => {
    await expect(controller.run({})).rejects.toBeInstanceOf(BadRequestException);
  });

  it('maps missing inventory to 422', async () => {
    jest.spyOn(loader, 'fetchFromApi').mockRejectedValue(new NoInventoryError('Inventory API returned no items'));

    await expect(
      controller.run({ orders: [uploaded('orders', 'labels.csv', 'order_id,custom_label\nA1,[a]/[b] 1*1')] }),
    ).rejects.toEqual(new UnprocessableEntityException('Inventory API returned no items'));
  });

  it('maps an empty orders file to 400', async () => {
    await expect(
      controller.run({
        orders: [uploaded('orders', 'labels.csv', '')],
        inventory: [uploaded('inventory', 'items.json', '[{"barcode": "1"}]')],
      }),
    ).rejects.toBeInstanceOf(BadRequestException);
  });
});
