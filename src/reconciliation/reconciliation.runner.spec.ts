import { Test } from '@nestjs/testing';
import { existsSync } from 'fs';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { APP_CONFIG, loadAppConfig } from '../config/app.config';
import { InventoryLoaderService } from '../inventory/inventory-loader.service';
import { BoxHeroService } from '../services/boxhero.service';
import { CsvService } from '../services/csv.service';
import { MissingOrderBatchError, NoInventoryError } from './reconciliation.errors';
import { ReconciliationRunner } from './reconciliation.runner';
import { ReconciliationService } from './reconciliation.service';

const INVENTORY = [
  { barcode: '111222', quantity: 10, sku: 'SKU-A' },
  { barcode: '333', quantity: 1, sku: 'SKU-B' },
];

const ORDERS_CSV = [
  'order_id,custom_label,customer',
  'A1,[a]/[b] 111222*4,Ann',
  'A2,[a]/[b] 333*2,Bob',
  'A3,[x]/[y] NOTE*2,Cy',
].join('\n');

describe('ReconciliationRunner', () => {
  let runner: ReconciliationRunner;
  let loader: InventoryLoaderService;
  let workDir: string;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        { provide: APP_CONFIG, useValue: loadAppConfig({ BOXHERO_API_TOKEN: 'test-token' }) },
        BoxHeroService,
        InventoryLoaderService,
        CsvService,
        ReconciliationService,
        ReconciliationRunner,
      ],
    }).compile();

    runner = moduleRef.get(ReconciliationRunner);
    loader = moduleRef.get(InventoryLoaderService);
    workDir = await mkdtemp(join(tmpdir(), 'reconciliation-runner-'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(workDir, { recursive: true, force: true });
  });

  const readLines = async (path: string) => (await readFile(path, 'utf-8')).split('\n');

  describe('runFiles', () => {
    it('writes the three partitions next to each other', async () => {
      const inventoryPath = join(workDir, 'full_items.json');
      const ordersPath = join(workDir, 'merged_labels.csv');
      const outDir = join(workDir, 'out');
      await writeFile(inventoryPath, JSON.stringify(INVENTORY), 'utf-8');
      await writeFile(ordersPath, ORDERS_CSV, 'utf-8');

      const { result, files } = await runner.runFiles({ ordersPath, outDir, inventoryPath });

      expect(result.summary).toEqual({ total: 3, fulfillable: 1, unfulfillable: 1, misc: 1 });
      expect(files).toEqual({
        fulfillable: join(outDir, 'fulfillable.csv'),
        unfulfillable: join(outDir, 'unfulfillable.csv'),
        misc: join(outDir, 'misc.csv'),
      });
      await expect(readLines(files.fulfillable)).resolves.toEqual([
        'order_id,custom_label,customer,sku_qty',
        'A1,[a]/[b] 111222*4,Ann,SKU-A*4',
      ]);
      await expect(readLines(files.unfulfillable)).resolves.toEqual([
        'order_id,custom_label,customer',
        'A2,[a]/[b] 333*2,Bob',
      ]);
      await expect(readLines(files.misc)).resolves.toEqual([
        'order_id,custom_label,customer',
        'A3,[x]/[y] NOTE*2,Cy',
      ]);
    });

    it('saves fetched inventory to the output directory by default', async () => {
      jest.spyOn(loader, 'fetchFromApi').mockResolvedValue(INVENTORY);
      const ordersPath = join(workDir, 'orders.csv');
      await writeFile(ordersPath, ORDERS_CSV, 'utf-8');

      await runner.runFiles({ ordersPath, outDir: workDir, locationIds: ['5'] });

      expect(loader.fetchFromApi).toHaveBeenCalledWith(['5']);
      expect(JSON.parse(await readFile(join(workDir, 'full_items.json'), 'utf-8'))).toEqual(
        INVENTORY,
      );
    });

    it('skips saving fetched inventory when asked to', async () => {
      jest.spyOn(loader, 'fetchFromApi').mockResolvedValue(INVENTORY);
      const ordersPath = join(workDir, 'orders.csv');
      await writeFile(ordersPath, ORDERS_CSV, 'utf-8');

      await runner.runFiles({ ordersPath, outDir: workDir, snapshotOut: false });

      expect(existsSync(join(workDir, 'full_items.json'))).toBe(false);
    });

    it('writes nothing when the inventory cannot be loaded', async () => {
      jest.spyOn(loader, 'fetchFromApi').mockRejectedValue(new NoInventoryError());
      const outDir = join(workDir, 'out');

      await expect(
        runner.runFiles({ ordersPath: join(workDir, 'orders.csv'), outDir }),
      ).rejects.toBeInstanceOf(NoInventoryError);
      expect(existsSync(outDir)).toBe(false);
    });

    it('writes nothing when the order batch is missing', async () => {
      const inventoryPath = join(workDir, 'full_items.json');
      const outDir = join(workDir, 'out');
      await writeFile(inventoryPath, JSON.stringify(INVENTORY), 'utf-8');

      await expect(
        runner.runFiles({ ordersPath: join(workDir, 'missing.csv'), outDir, inventoryPath }),
      ).rejects.toBeInstanceOf(MissingOrderBatchError);
      expect(existsSync(outDir)).toBe(false);
    });
  });

  describe('runUpload', () => {
    it('reconciles uploaded buffers and renders csv', async () => {
      const { result, csv } = await runner.runUpload({
        orders: Buffer.from(ORDERS_CSV, 'utf-8'),
        inventory: Buffer.from(JSON.stringify(INVENTORY), 'utf-8'),
      });

      expect(result.fulfillable).toEqual([
        { order_id: 'A1', custom_label: '[a]/[b] 111222*4', customer: 'Ann', sku_qty: 'SKU-A*4' },
      ]);
      expect(csv.misc).toBe('order_id,custom_label,customer\nA3,[x]/[y] NOTE*2,Cy');
    });

    it('fetches inventory when no snapshot is uploaded', async () => {
      jest.spyOn(loader, 'fetchFromApi').mockResolvedValue(INVENTORY);

      const { result } = await runner.runUpload({ orders: Buffer.from(ORDERS_CSV, 'utf-8') });

      expect(loader.fetchFromApi).toHaveBeenCalledWith(undefined);
      expect(result.summary.total).toBe(3);
    });

    it('requires an orders file', async () => {
      await expect(
        runner.runUpload({ inventory: Buffer.from(JSON.stringify(INVENTORY), 'utf-8') }),
      ).rejects.toBeInstanceOf(MissingOrderBatchError);
    });
  });
});
