/**
 * CSV reader for the interaction and recipe datasets.
 *
 * Parsing is csv-parse's sync API. A stray quote inside an unquoted field
 * (`a 12" pan`) is kept as text; blank lines are skipped.
 */

import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { DataShapeError } from '../errors';

export interface CsvDocument {
  header: string[];
  /** Data rows, each as a column -> raw value map */
  rows: Array<Record<string, string>>;
  /** Source line each row ends on (for error messages) */
  lines: number[];
}

interface ParsedRecord {
  fields: string[];
  line: number;
}

/**
 * Narrow one `{ record, info }` entry emitted with `info: true`
 */
function toParsedRecord(value: unknown, source: string): ParsedRecord {
  if (
    typeof value !== 'object' ||
    value === null ||
    !('record' in value) ||
    !('info' in value) ||
    !Array.isArray(value.record) ||
    typeof value.info !== 'object' ||
    value.info === null ||
    !('lines' in value.info) ||
    typeof value.info.lines !== 'number'
  ) {
    throw new DataShapeError(`${source}: unexpected parser output`);
  }
  const fields = value.record.map((field: unknown) => String(field));
  return { fields, line: value.info.lines };
}

function parseRecords(text: string, source: string): ParsedRecord[] {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      bom: true,
      info: true,
      relax_quotes: true,
      relax_column_count: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DataShapeError(`${source}: ${message}`);
  }

  if (!Array.isArray(parsed)) {
    throw new DataShapeError(`${source}: unexpected parser output`);
  }
  return parsed.map((entry: unknown) => toParsedRecord(entry, source));
}

/**
 * Parse CSV text. First record is the header.
 *
 * @throws DataShapeError on empty input, malformed quoting or a row with the wrong field count
 */
export function parseCsv(text: string, source: string = 'csv'): CsvDocument {
  const records = parseRecords(text, source);
  if (records.length === 0) {
    throw new DataShapeError(`${source}: file is empty`);
  }

  const header = records[0].fields.map(name => name.trim());
  const rows: Array<Record<string, string>> = [];
  const lines: number[] = [];

  for (const { fields, line } of records.slice(1)) {
    if (fields.length !== header.length) {
      throw new DataShapeError(
        `${source}: line ${line} has ${fields.length} fields, expected ${header.length}`
      );
    }
    const row: Record<string, string> = {};
    header.forEach((name, index) => {
      row[name] = fields[index];
    });
    rows.push(row);
    lines.push(line);
  }

  return { header, rows, lines };
}

/**
 * Check the header holds every required column
 */
export function requireColumns(doc: CsvDocument, columns: readonly string[], source: string): void {
  const missing = columns.filter(column => !doc.header.includes(column));
  if (missing.length > 0) {
    throw new DataShapeError(`${source}: missing column(s) ${missing.join(', ')}`);
  }
}

export async function readCsvFile(path: string): Promise<CsvDocument> {
  const text = await readFile(path, 'utf8');
  return parseCsv(text, path);
}
