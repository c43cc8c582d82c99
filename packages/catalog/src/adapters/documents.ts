import { parse as parseYaml, YAMLParseError } from 'yaml';
import { parse as parseCsv } from 'csv-parse/sync';
import { z } from 'zod';
import type { DataRow } from '../models/types.js';

export class DocumentParseError extends Error {
  constructor(
    message: string,
    readonly source: string,
  ) {
    super(message);
    this.name = 'DocumentParseError';
  }
}

/** Parse a YAML document; an empty document yields null. */
export function parseYamlDocument(content: string, source: string): unknown {
  try {
    return parseYaml(content) ?? null;
  } catch (err) {
    const detail = err instanceof YAMLParseError ? err.message : String(err);
    throw new DocumentParseError(`Invalid YAML in ${source}: ${detail}`, source);
  }
}

const CsvRowsSchema = z.array(z.record(z.string()));

/**
 * Parse CSV text with a header row into one mapping per data row.
 * Columns with an empty header are dropped.
 */
export function parseCsvRows(content: string, source: string): DataRow[] {
  let records: unknown;
  try {
    records = parseCsv(content, {
      columns: true,
      bom: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (err) {
    throw new DocumentParseError(
      `Invalid CSV in ${source}: ${err instanceof Error ? err.message : String(err)}`,
      source,
    );
  }

  const rows = CsvRowsSchema.parse(records);
  return rows.map((row) => {
    const cleaned: DataRow = {};
    for (const [key, value] of Object.entries(row)) {
      if (key) cleaned[key] = value;
    }
    return cleaned;
  });
}
