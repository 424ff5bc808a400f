import { Injectable } from '@nestjs/common';
import * as XLSX from 'xlsx';
import { MissingOrderBatchError } from '../reconciliation/reconciliation.errors';
import { OrderBatch, OrderRow } from '../reconciliation/reconciliation.types';

@Injectable()
export class CsvService {
  parseOrderBatch(buffer: Buffer): OrderBatch {
    if (!buffer.length) {
      throw new MissingOrderBatchError('Order batch file is empty');
    }

    // raw: cells stay text, so barcodes keep leading zeros and pass through unchanged.
    const workbook = this.isSpreadsheetBinary(buffer)
      ? XLSX.read(buffer, { type: 'buffer', raw: true })
      : XLSX.read(this.decodeText(buffer), { type: 'string', raw: true });
    if (!workbook.SheetNames.length) {
      throw new MissingOrderBatchError('Order batch has no sheets');
    }

    const firstSheet = workbook.Sheets[workbook.SheetNames[0]];
    const table = XLSX.utils.sheet_to_json<unknown[]>(firstSheet, {
      header: 1,
      defval: '',
      blankrows: false,
      raw: true,
    });

    const [headerRow, ...dataRows] = table;
    if (!headerRow || !headerRow.length) {
      throw new MissingOrderBatchError('Order batch has no header row');
    }

    const headers = this.uniqueHeaders(headerRow.map((cell) => this.toText(cell)));
    const rows = dataRows.map((cells) => {
      const row: OrderRow = {};
      headers.forEach((header, column) => {
        row[header] = this.toText(cells[column]);
      });
      return row;
    });

    return { headers, rows };
  }

  toCsv(headers: string[], rows: OrderRow[]): string {
    const table = [headers, ...rows.map((row) => headers.map((header) => row[header] ?? ''))];
    const sheet = XLSX.utils.aoa_to_sheet(table);
    return XLSX.utils.sheet_to_csv(sheet);
  }

  // XLSX files are zip archives; XLS files are compound documents.
  private isSpreadsheetBinary(buffer: Buffer): boolean {
    const zip = [0x50, 0x4b, 0x03, 0x04];
    const compound = [0xd0, 0xcf, 0x11, 0xe0];
    const startsWith = (magic: number[]) => magic.every((byte, index) => buffer[index] === byte);

    return startsWith(zip) || startsWith(compound);
  }

  private decodeText(buffer: Buffer): string {
    return buffer.toString('utf-8').replace(/^\uFEFF/, '');
  }

  // Repeated header names get a numeric suffix (`note`, `note.1`) so no column is lost.
  private uniqueHeaders(headers: string[]): string[] {
    const seen = new Set<string>();

    return headers.map((header) => {
      let name = header;
      for (let suffix = 1; seen.has(name); suffix += 1) {
        name = `${header}.${suffix}`;
      }

      seen.add(name);
      return name;
    });
  }

  private toText(value: unknown): string {
    return value == null ? '' : String(value);
  }
}
