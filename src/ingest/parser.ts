/**
 * Upload parser for the bulk shipment template.
 *
 * The template has two header rows followed by one shipment per row in a fixed
 * 23-column layout. Columns are mapped by position; header text is only
 * checked when header validation is switched on.
 */

import csv from 'csv-parser';
import { Readable } from 'stream';
import { FieldRecord } from '../types/domain';
import { config } from '../config';
import { logger } from '../config/logger';
import { ShippingError, ErrorCode, errorMessage } from '../errors';

const log = logger.child('parser');

export const HEADER_ROWS = 2;
export const COLUMN_COUNT = 23;

/**
 * Expected labels of header row 2, in column order
 */
export const COLUMN_LABELS: readonly string[] = [
  'First Name',
  'Last Name',
  'Address',
  'Address 2',
  'City',
  'ZIP Code',
  'State',
  'First Name',
  'Last Name',
  'Address',
  'Address 2',
  'City',
  'ZIP Code',
  'State',
  'Weight (lbs)',
  'Weight (oz)',
  'Length',
  'Width',
  'Height',
  'Phone',
  'Phone',
  'Order No',
  'Item SKU',
];

export interface ParseOptions {
  delimiter?: string;
  validateHeaders?: boolean;
}

export async function parseShipmentFile(
  bytes: Uint8Array | string,
  options: ParseOptions = {}
): Promise<FieldRecord[]> {
  const delimiter = options.delimiter ?? config.ingestion.delimiter;
  const validateHeaders = options.validateHeaders ?? config.ingestion.validateHeaders;

  log.info('Starting CSV parsing');

  const content = decode(bytes);
  const rows = await readRows(content, delimiter);

  if (rows.length < HEADER_ROWS || rows.slice(0, HEADER_ROWS).some(isBlankRow)) {
    throw new ShippingError(ErrorCode.FORMAT_ERROR, 'CSV file must have at least 2 header rows');
  }

  log.info('CSV headers parsed', {
    firstRowColumns: rows[0].length,
    secondRowColumns: rows[1].length,
  });

  if (validateHeaders) {
    assertHeaderLayout(rows[1]);
  }

  const records: FieldRecord[] = [];

  rows.slice(HEADER_ROWS).forEach((row, index) => {
    const rowNumber = index + 1;

    if (isBlankRow(row)) {
      return;
    }

    try {
      records.push(toFieldRecord(padRow(row), rowNumber));
    } catch (error) {
      log.warn(`Error parsing row ${rowNumber}`, { error: errorMessage(error) });
    }
  });

  log.info(`CSV parsing completed. Parsed ${records.length} records`);

  return records;
}

function decode(bytes: Uint8Array | string): string {
  if (typeof bytes === 'string') {
    return bytes.replace(/^\uFEFF/, '');
  }

  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new ShippingError(ErrorCode.FORMAT_ERROR, 'Failed to parse CSV file: file is not valid UTF-8', {
      originalError: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Tokenise CSV text into positional rows
 */
function readRows(content: string, separator: string): Promise<string[][]> {
  return new Promise((resolve, reject) => {
    const rows: string[][] = [];

    Readable.from([content])
      .pipe(csv({ headers: false, separator }))
      .on('data', (row: Record<string, string>) => {
        rows.push(toCells(row));
      })
      .on('end', () => resolve(rows))
      .on('error', (error: Error) => {
        reject(
          new ShippingError(ErrorCode.FORMAT_ERROR, `Failed to parse CSV file: ${error.message}`, {
            originalError: error,
          })
        );
      });
  });
}

/**
 * csv-parser emits header-less rows keyed by column index
 */
function toCells(row: Record<string, string>): string[] {
  const cells: string[] = [];
  for (const [key, value] of Object.entries(row)) {
    const index = Number(key.replace(/^_/, ''));
    if (Number.isInteger(index)) {
      cells[index] = value;
    }
  }
  return Array.from(cells, (cell) => cell ?? '');
}

function isBlankRow(row: string[]): boolean {
  return row.every((cell) => !cell.trim());
}

function padRow(row: string[]): string[] {
  if (row.length >= COLUMN_COUNT) {
    return row;
  }
  return [...row, ...new Array<string>(COLUMN_COUNT - row.length).fill('')];
}

function normalizeLabel(label: string): string {
  return label.toLowerCase().replace(/[^a-z0-9]/g, '');
}

function assertHeaderLayout(header: string[]): void {
  const cells = padRow(header);
  const mismatch = COLUMN_LABELS.findIndex(
    (label, index) => normalizeLabel(label) !== normalizeLabel(cells[index])
  );

  if (mismatch !== -1) {
    throw new ShippingError(
      ErrorCode.FORMAT_ERROR,
      `Unexpected header in column ${mismatch + 1}: expected "${COLUMN_LABELS[mismatch]}", found "${cells[mismatch].trim()}"`,
      { details: { column: mismatch + 1 } }
    );
  }
}

function toFieldRecord(row: string[], rowNumber: number): FieldRecord {
  const text = (index: number): string => row[index].trim();

  return {
    // Ship From (columns 0-6)
    shipFromFirstName: text(0),
    shipFromLastName: text(1),
    shipFromAddress: text(2),
    shipFromAddress2: text(3),
    shipFromCity: text(4),
    shipFromZip: text(5),
    shipFromState: text(6),
    // Ship To (columns 7-13)
    shipToFirstName: text(7),
    shipToLastName: text(8),
    shipToAddress: text(9),
    shipToAddress2: text(10),
    shipToCity: text(11),
    shipToZip: text(12),
    shipToState: text(13),
    // Package (columns 14-18)
    weightLbs: parseInteger(row[14]),
    weightOz: parseInteger(row[15]),
    length: parseDecimal(row[16]),
    width: parseDecimal(row[17]),
    height: parseDecimal(row[18]),
    // Contact (columns 19-20)
    shipToPhone: text(19),
    shipFromPhone: text(20),
    // Reference (columns 21-22)
    orderNo: text(21),
    itemSku: text(22),
    rowNumber,
  };
}

/**
 * Lenient integer cell: unit suffixes and other junk are stripped first
 */
export function parseInteger(value: string): number | undefined {
  if (!value || !value.trim()) {
    return undefined;
  }
  const cleaned = value.trim().replace(/[^0-9.-]/g, '');
  if (!cleaned) {
    return undefined;
  }
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? Math.trunc(parsed) : undefined;
}

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Strict decimal cell: plain or exponent notation only, no hex or binary literals
 */
export function parseDecimal(value: string): number | undefined {
  const trimmed = value ? value.trim() : '';
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return undefined;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}
