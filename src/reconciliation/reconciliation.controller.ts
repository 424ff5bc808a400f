import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Header,
  HttpCode,
  HttpStatus,
  Post,
  UnprocessableEntityException,
  UploadedFiles,
  UseInterceptors,
} from '@nestjs/common';
import { FileFieldsInterceptor } from '@nestjs/platform-express';
import { memoryStorage } from 'multer';
import { parseIdList } from '../config/app.config';
import { ReconciliationFatalError } from './reconciliation.errors';
import { ReconciliationRunner } from './reconciliation.runner';
import { ReconciliationResult } from './reconciliation.types';
import { RunReconciliationDto } from './run-reconciliation.dto';
import { UPLOAD_UI_CLIENT_JS } from './upload-ui.client';
import { UPLOAD_UI_HTML } from './upload-ui.page';

const ALLOWED_EXTENSIONS: Record<string, string[]> = {
  orders: ['.csv', '.xlsx', '.xls'],
  inventory: ['.json'],
};

export interface RunFiles {
  orders?: Express.Multer.File[];
  inventory?: Express.Multer.File[];
}

export type RunResponse = ReconciliationResult & {
  csv: { fulfillable: string; unfulfillable: string; misc: string };
};

@Controller('reconciliation')
export class ReconciliationController {
  constructor(private readonly runner: ReconciliationRunner) {}

  @Get('upload-ui')
  @Header('Content-Type', 'text/html; charset=utf-8')
  getUploadUi(): string {
    return UPLOAD_UI_HTML;
  }

  @Get('upload-ui.js')
  @Header('Content-Type', 'application/javascript; charset=utf-8')
  getUploadUiScript(): string {
    return UPLOAD_UI_CLIENT_JS;
  }

  @Post('run')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(
    FileFieldsInterceptor(
      [
        { name: 'orders', maxCount: 1 },
        { name: 'inventory', maxCount: 1 },
      ],
      {
        storage: memoryStorage(),
        limits: {
          fileSize: 10 * 1024 * 1024,
        },
        fileFilter: (_req, file, callback) => {
          const name = file.originalname.toLowerCase();
          const allowed = (ALLOWED_EXTENSIONS[file.fieldname] ?? []).some((ext) =>
            name.endsWith(ext),
          );

          callback(
            allowed
              ? null
              : new BadRequestException(
                  `Unsupported file for "${file.fieldname}": expected ${(
                    ALLOWED_EXTENSIONS[file.fieldname] ?? []
                  ).join(', ')}`,
                ),
            allowed,
          );
        },
      },
    ),
  )
  async run(
    @UploadedFiles() files: RunFiles = {},
    @Body() body: RunReconciliationDto = {},
  ): Promise<RunResponse> {
    const orders = files.orders?.[0];
    if (!orders?.buffer) {
      throw new BadRequestException('No orders file uploaded');
    }

    const locationIds = body.locationIds ? parseIdList(body.locationIds) : undefined;

    try {
      const { result, csv } = await this.runner.runUpload({
        orders: orders.buffer,
        inventory: files.inventory?.[0]?.buffer,
        locationIds,
      });
      return { ...result, csv };
    } catch (error: unknown) {
      if (error instanceof ReconciliationFatalError) {
        throw error.code === 'NO_INVENTORY'
          ? new UnprocessableEntityException(error.message)
          : new BadRequestException(error.message);
      }

      throw error;
    }
  }
}
