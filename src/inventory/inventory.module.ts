import { Module } from '@nestjs/common';
import { BoxHeroService } from '../services/boxhero.service';
import { InventoryLoaderService } from './inventory-loader.service';

@Module({
  providers: [BoxHeroService, InventoryLoaderService],
  exports: [InventoryLoaderService],
})
export class InventoryModule {}
