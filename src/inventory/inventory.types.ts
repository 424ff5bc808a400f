export interface InventoryRecord {
  barcode?: string | number | null;
  quantity?: number | string | null;
  sku?: string | null;
  [field: string]: unknown;
}

/** One page of `GET /v1/items`. */
export interface InventoryItemsPage {
  items: InventoryRecord[];
  has_more: boolean;
  cursor?: string | null;
}

export interface LedgerEntry {
  quantity: number;
  sku: string;
}
