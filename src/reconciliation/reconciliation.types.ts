import { InventoryRecord } from '../inventory/inventory.types';

export const LABEL_COLUMN = 'custom_label';
export const SKU_QTY_COLUMN = 'sku_qty';
export const UNKNOWN_SKU = 'UNKNOWN';

export type OrderRow = Record<string, string>;

export interface OrderBatch {
  headers: string[];
  rows: OrderRow[];
}

export interface LineItem {
  barcode: string;
  quantity: number;
}

export type MiscReason = 'unparseable_label' | 'non_inventory_barcode' | 'row_error';

export type RowOutcome =
  | { bucket: 'fulfillable'; row: OrderRow; skuQty: string }
  | { bucket: 'unfulfillable'; row: OrderRow }
  | { bucket: 'misc'; row: OrderRow; reason: MiscReason };

export interface ReconciliationSummary {
  total: number;
  fulfillable: number;
  unfulfillable: number;
  misc: number;
}

export interface ReconciliationResult {
  headers: string[];
  fulfillable: OrderRow[];
  unfulfillable: OrderRow[];
  misc: OrderRow[];
  summary: ReconciliationSummary;
}

export interface ReconciliationInput {
  inventory: InventoryRecord[] | null | undefined;
  orders: OrderBatch | null | undefined;
}
