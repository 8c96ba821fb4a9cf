import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import type { Delimiter } from '../config/schema.js';
import { LEDGER_HEADER, type LedgerEntry } from './types.js';

const FILE_PATH_FALLBACK_INDEX = 1;

export function entryToRow(entry: LedgerEntry): string[] {
  return [
    entry.endTimeIso,
    entry.filePath,
    entry.fileName,
    String(entry.fileSizeBytes),
    entry.durationSeconds === null ? '' : String(entry.durationSeconds),
    entry.sha256,
  ];
}

export function formatRows(rows: string[][], delimiter: Delimiter): string {
  return stringify(rows, { delimiter, record_delimiter: 'unix' });
}

export function formatHeader(delimiter: Delimiter): string {
  return formatRows([[...LEDGER_HEADER]], delimiter);
}

export function parseRows(text: string, delimiter: Delimiter): string[][] {
  return parse(text, {
    delimiter,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
    bom: true,
  });
}

/**
 * Returns the `file_path` cell of every data row. A first row starting with
 * the header's first column is treated as a header and used to locate the
 * column by name; otherwise column 1 is assumed throughout.
 */
export function extractFilePaths(rows: string[][]): string[] {
  if (rows.length === 0) return [];

  let index = FILE_PATH_FALLBACK_INDEX;
  let body = rows;
  const first = rows[0];
  if (first.length > 0 && first[0] === LEDGER_HEADER[0]) {
    const named = first.indexOf('file_path');
    index = named >= 0 ? named : FILE_PATH_FALLBACK_INDEX;
    body = rows.slice(1);
  }

  const paths: string[] = [];
  for (const row of body) {
    if (row.length <= index) continue;
    const cell = row[index].trim();
    if (cell) paths.push(cell);
  }
  return paths;
}
