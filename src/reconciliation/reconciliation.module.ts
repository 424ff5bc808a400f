import { Module } from '@nestjs/common';
import { InventoryModule } from '../inventory/inventory.module';
import { CsvService } from '../services/csv.service';
import { ReconciliationController } from './reconciliation.controller';
import { ReconciliationService } from './reconciliation.service';
import { ReconciliationRunner } from './reconciliation.runner';

@Module({
  imports: [InventoryModule],
  controllers: [ReconciliationController],
  providers: [CsvService, ReconciliationService, ReconciliationRunner],
  exports: [ReconciliationRunner],
})
export class ReconciliationModule {}
