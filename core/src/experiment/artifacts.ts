import fs from 'fs-extra';
import { z } from 'zod';
import { ExperimentResult } from '../types';
import { errorMessage } from '../errors';
import { ResultRow, toRow } from './evaluation';

export const CSV_COLUMNS = [
  'query',
  'true_track',
  'noise_level',
  'predicted',
  'ncd_value',
  'compressor',
  'correct',
  'processing_time_ms',
  'cutoff',
  'top_matches'
] as const;

/**
 * Encode track ids as `<length>:<id>` repeated. Any character may appear in
 * an id, including the separator, because the length says where it ends.
 */
export function encodeMatchList(ids: readonly string[]): string {
  return ids.map(id => `${id.length}:${id}`).join('');
}

export function decodeMatchList(encoded: string): string[] {
  const ids: string[] = [];
  let pos = 0;
  while (pos < encoded.length) {
    const colon = encoded.indexOf(':', pos);
    const digits = colon === -1 ? '' : encoded.slice(pos, colon);
    if (!/^\d+$/.test(digits)) {
      throw new Error(`Malformed match list at offset ${pos}`);
    }
    const length = Number(digits);
    const end = colon + 1 + length;
    if (end > encoded.length) {
      throw new Error(`Match list entry at offset ${pos} runs past the end`);
    }
    ids.push(encoded.slice(colon + 1, end));
    pos = end;
  }
  return ids;
}

export function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsvRow(row: ResultRow): string {
  const fields = [
    row.query,
    row.trueTrack ?? '',
    String(row.noiseLevel),
    row.predicted,
    String(row.ncd),
    row.compressor,
    row.correct === undefined ? '' : String(row.correct),
    row.processingTimeMs.toFixed(3),
    String(row.cutoff),
    encodeMatchList(row.topMatches)
  ];
  return fields.map(escapeCsvField).join(',');
}

/**
 * RFC 4180 style parser: quoted fields may contain commas, quotes ("") and
 * line breaks.
 */
export function parseCsv(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && field === '') {
      inQuotes = true;
    } else if (ch === ',') {
      record.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      record.push(field);
      records.push(record);
      record = [];
      field = '';
      if (ch === '\r' && text[i + 1] === '\n') i++;
    } else {
      field += ch;
    }
    i++;
  }

  if (inQuotes) {
    throw new Error('Unterminated quoted field in CSV');
  }
  if (field !== '' || record.length > 0) {
    record.push(field);
    records.push(record);
  }
  return records;
}

const optionalText = z.string().transform(v => (v === '' ? undefined : v));

const csvRowSchema = z.object({
  query: z.string().min(1),
  true_track: optionalText,
  noise_level: z.coerce.number(),
  predicted: z.string(),
  ncd_value: z.coerce.number().min(0).max(1),
  compressor: z.string().min(1),
  correct: z.enum(['', 'true', 'false']).transform(v => (v === '' ? undefined : v === 'true')),
  processing_time_ms: z.coerce.number().nonnegative(),
  cutoff: z.coerce.number().int().nonnegative(),
  top_matches: z.string().transform((v, ctx) => {
    try {
      return decodeMatchList(v);
    } catch (error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(error) });
      return z.NEVER;
    }
  })
});

export function parseResultsCsv(text: string): ResultRow[] {
  const records = parseCsv(text).filter(r => !(r.length === 1 && r[0] === ''));
  if (records.length === 0) return [];

  const [header, ...rows] = records;
  const missing = CSV_COLUMNS.filter(c => !header.includes(c));
  if (missing.length > 0) {
    throw new Error(`Results CSV is missing columns: ${missing.join(', ')}`);
  }

  return rows.map((values, lineIndex) => {
    const raw = Object.fromEntries(header.map((name, i) => [name, values[i] ?? '']));
    const parsed = csvRowSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Invalid results row ${lineIndex + 2}: ${parsed.error.issues.map(i => `${i.path.join('.')} ${i.message}`).join('; ')}`);
    }
    const r = parsed.data;
    return {
      query: r.query,
      trueTrack: r.true_track,
      noiseLevel: r.noise_level,
      predicted: r.predicted,
      ncd: r.ncd_value,
      compressor: r.compressor,
      correct: r.correct,
      processingTimeMs: r.processing_time_ms,
      cutoff: r.cutoff,
      topMatches: r.top_matches
    };
  });
}

export async function readResultsCsv(file: string): Promise<ResultRow[]> {
  return parseResultsCsv(await fs.readFile(file, 'utf-8'));
}

/**
 * Append-only CSV table. The header is written when the file is created;
 * every completed result is appended as one row, in call order.
 */
export class CsvResultWriter {
  private pending: Promise<void> = Promise.resolve();

  private constructor(readonly file: string) {}

  static async open(file: string, options: { truncate?: boolean } = {}): Promise<CsvResultWriter> {
    const exists = await fs.pathExists(file);
    if (options.truncate || !exists || (await fs.stat(file)).size === 0) {
      await fs.outputFile(file, CSV_COLUMNS.join(',') + '\n');
    }
    return new CsvResultWriter(file);
  }

  append(result: ExperimentResult): Promise<void> {
    const line = formatCsvRow(toRow(result)) + '\n';
    // A failed write was already reported to its own caller.
    const next = this.pending.catch(() => undefined).then(() => fs.appendFile(this.file, line));
    this.pending = next;
    return next;
  }
}

export async function writeResultsJson(file: string, results: readonly ExperimentResult[]): Promise<void> {
  await fs.outputJson(file, results, { spaces: 2 });
}
