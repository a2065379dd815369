import { existsSync, readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { Readable } from 'node:stream';

import ExcelJS from 'exceljs';

import { ISO_DATE_RE, toIsoDate } from '../utils/dates.js';
import { logDebug, logInfo, logWarn } from '../utils/logger.js';
import { addPartInstance } from './registryService.js';
import type { TrackerSession } from './session.js';

export const REQUIRED_IMPORT_COLUMNS = ['part_number', 'serial_number', 'manufacture_date'] as const;

type ImportColumn = (typeof REQUIRED_IMPORT_COLUMNS)[number];

export type ImportRow = {
  row: number; // spreadsheet row, header is row 1
  partNumber: string;
  serialNumber: string;
  manufactureDate: string;
};

export type ImportSummary = {
  added: number;
  failed: number;
  errors: Array<{ row: number; error: string }>;
  error: string | null;
};

function emptySummary(error: string | null = null): ImportSummary {
  return { added: 0, failed: 0, errors: [], error };
}

function cellText(cell: ExcelJS.Cell): string {
  const value = cell.value;
  if (value instanceof Date) return toIsoDate(value);
  return cell.text.trim();
}

function normalizeHeader(value: string): string {
  return value.replaceAll('\ufeff', '').trim().toLowerCase();
}

export function readImportSheet(sheet: ExcelJS.Worksheet): { ok: true; rows: ImportRow[] } | { ok: false; error: string } {
  const header = sheet.getRow(1);
  const columns = new Map<string, number>();
  header.eachCell((cell, colNumber) => {
    const name = normalizeHeader(cellText(cell));
    if (name && !columns.has(name)) columns.set(name, colNumber);
  });

  for (const col of REQUIRED_IMPORT_COLUMNS) {
    if (!columns.has(col)) return { ok: false, error: `missing required column: ${col}` };
  }
  const textAt = (row: ExcelJS.Row, col: ImportColumn): string => {
    const pos = columns.get(col);
    return pos === undefined ? '' : cellText(row.getCell(pos));
  };

  const rows: ImportRow[] = [];
  sheet.eachRow((row, rowNumber) => {
    if (rowNumber === 1) return;
    rows.push({
      row: rowNumber,
      partNumber: textAt(row, 'part_number'),
      serialNumber: textAt(row, 'serial_number'),
      manufactureDate: textAt(row, 'manufacture_date'),
    });
  });
  return { ok: true, rows };
}

// Rows are independent: a rejected row is counted and the rest still go in.
export function importPartInstanceRows(session: TrackerSession, rows: ImportRow[]): ImportSummary {
  const summary = emptySummary();
  for (const r of rows) {
    if (r.manufactureDate && !ISO_DATE_RE.test(r.manufactureDate)) {
      const error = `invalid manufacture date ${r.manufactureDate}, expected YYYY-MM-DD`;
      logWarn('import row rejected', { row: r.row, error });
      summary.failed += 1;
      summary.errors.push({ row: r.row, error });
      continue;
    }
    const result = addPartInstance(session, {
      partNumber: r.partNumber,
      serialNumber: r.serialNumber,
      manufactureDate: r.manufactureDate,
    });
    if (result.ok) {
      summary.added += 1;
      logDebug('import row added', { row: r.row, serialNumber: result.instance.serial_number });
    } else {
      summary.failed += 1;
      summary.errors.push({ row: r.row, error: result.message });
    }
  }
  return summary;
}

async function loadWorksheet(filePath: string): Promise<ExcelJS.Worksheet | undefined> {
  const workbook = new ExcelJS.Workbook();
  if (extname(filePath).toLowerCase() === '.csv') {
    // exceljs does not forward read-stream errors from csv.readFile; read errors must reject here.
    const content = readFileSync(filePath);
    // Keep cells as written: no number/date guessing.
    return workbook.csv.read(Readable.from([content]), { map: (value: string) => value });
  }
  await workbook.xlsx.readFile(filePath);
  return workbook.worksheets[0];
}

export async function importPartInstancesFromFile(session: TrackerSession, filePath: string): Promise<ImportSummary> {
  if (!existsSync(filePath)) return emptySummary('file not found');
  const ext = extname(filePath).toLowerCase();
  if (ext !== '.csv' && ext !== '.xlsx') return emptySummary('unsupported file type');

  let sheet: ExcelJS.Worksheet | undefined;
  try {
    sheet = await loadWorksheet(filePath);
  } catch (e) {
    logWarn('import: failed to read file', { filePath, error: String(e) });
    return emptySummary(`failed to read file: ${String(e)}`);
  }
  if (!sheet) return emptySummary('workbook has no sheets');

  const parsed = readImportSheet(sheet);
  if (!parsed.ok) return emptySummary(parsed.error);

  const summary = importPartInstanceRows(session, parsed.rows);
  logInfo('import finished', { filePath, added: summary.added, failed: summary.failed });
  return summary;
}
