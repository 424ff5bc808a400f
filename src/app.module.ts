import { Module } from '@nestjs/common';
import { AppConfigModule } from './config/config.module';
import { ReconciliationModule } from './reconciliation/reconciliation.module';

@Module({
  imports: [AppConfigModule, ReconciliationModule],
})
export class AppModule {}
