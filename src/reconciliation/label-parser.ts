import { LineItem } from './reconciliation.types';

const LABEL_PATTERN = /^\[.*?\]\/\[.*?\]\s*(.*)$/;
const TOKEN_SEPARATOR = /\s*,\s*/;
const QUANTITY_PATTERN = /^\d+$/;
const INVENTORY_BARCODE_PATTERN = /^\d/;

/**
 * Parses a label of the form `[..]/[..] <barcode>*<qty>, <barcode>*<qty>`.
 *
 * Returns an empty list when any part of the label is malformed; a single bad
 * token invalidates the whole label.
 */
export function parseLabel(label: string | null | undefined): LineItem[] {
  const match = LABEL_PATTERN.exec((label ?? '').trim());
  if (!match) {
    return [];
  }

  const content = match[1].trim();
  if (!content) {
    return [];
  }

  const items: LineItem[] = [];
  for (const token of content.split(TOKEN_SEPARATOR)) {
    const separatorIndex = token.lastIndexOf('*');
    if (!token || separatorIndex === -1) {
      return [];
    }

    const barcode = token.slice(0, separatorIndex).trim();
    const quantityText = token.slice(separatorIndex + 1).trim();
    if (!QUANTITY_PATTERN.test(quantityText)) {
      return [];
    }

    items.push({ barcode, quantity: Number(quantityText) });
  }

  return items;
}

// Tokens that do not start with a digit are treated as free-text notes, not barcodes.
export function isNonInventoryOrder(items: LineItem[]): boolean {
  return items.some((item) => !INVENTORY_BARCODE_PATTERN.test(item.barcode));
}
