import path from 'path';
import fs from 'fs-extra';
import { Algorithm, ExperimentResult } from '../types';
import {
  CSV_COLUMNS,
  CsvResultWriter,
  decodeMatchList,
  encodeMatchList,
  formatCsvRow,
  parseCsv,
  parseResultsCsv,
  readResultsCsv,
  writeResultsJson
} from '../experiment/artifacts';
import { toRow } from '../experiment/evaluation';
import { makeTempDir } from './helpers';

const HEADER = CSV_COLUMNS.join(',');

function result(overrides: Partial<ExperimentResult> = {}): ExperimentResult {
  return {
    queryId: 'song1_segment_01',
    queryPath: '/queries/song1_segment_01.wav',
    compressor: Algorithm.GZIP,
    noiseLevel: 0,
    bestMatch: 'song1',
    ncd: 0.25,
    topMatches: [{ trackId: 'song1', ncd: 0.25 }, { trackId: 'song, "two"', ncd: 0.5 }],
    cutoff: 2,
    processingTimeMs: 1.5,
    trueTrack: 'song1',
    correct: true,
    ...overrides
  };
}

describe('match list encoding', () => {
  it('should length-prefix every id', () => {
    expect(encodeMatchList(['a', 'b:c', '12'])).toBe('1:a3:b:c2:12');
    expect(decodeMatchList('1:a3:b:c2:12')).toEqual(['a', 'b:c', '12']);
  });

  it('should accept empty lists and empty ids', () => {
    expect(decodeMatchList('')).toEqual([]);
    expect(decodeMatchList('0:1:x')).toEqual(['', 'x']);
  });

  it('should reject malformed input', () => {
    expect(() => decodeMatchList('x:a')).toThrow('Malformed match list at offset 0');
    expect(() => decodeMatchList('1:a5:bc')).toThrow('Match list entry at offset 3 runs past the end');
    expect(() => decodeMatchList('["a", "b"]')).toThrow('Malformed match list');
  });
});

describe('CSV', () => {
  it('should quote fields that need it', () => {
    const line = formatCsvRow({
      query: 'q,1',
      noiseLevel: 0.05,
      predicted: 'say "hi"',
      ncd: 0.5,
      compressor: 'gzip',
      processingTimeMs: 12.25,
      cutoff: 2,
      topMatches: ['a', 'b']
    });
    expect(line).toBe('"q,1",,0.05,"say ""hi""",0.5,gzip,,12.250,2,1:a1:b');
  });

  it('should parse quoted commas, quotes and line breaks', () => {
    expect(parseCsv('a,"b\nc",d\r\ne,"f ""g"""\n')).toEqual([
      ['a', 'b\nc', 'd'],
      ['e', 'f "g"']
    ]);
  });

  it('should reject an unterminated quote', () => {
    expect(() => parseCsv('a,"b')).toThrow('Unterminated quoted field in CSV');
  });

  it('should read rows back into result rows', () => {
    const text = `${HEADER}\n${formatCsvRow(toRow(result()))}\n`;
    expect(parseResultsCsv(text)).toEqual([toRow(result())]);
  });

  it('should leave optional columns undefined when blank', () => {
    const text = `${HEADER}\n${formatCsvRow(toRow(result({ trueTrack: undefined, correct: undefined })))}\n`;
    const [row] = parseResultsCsv(text);
    expect(row.trueTrack).toBeUndefined();
    expect(row.correct).toBeUndefined();
  });

  it('should name missing columns', () => {
    expect(() => parseResultsCsv('query,ncd_value\nq,0.5\n')).toThrow(
      'Results CSV is missing columns: true_track, noise_level, predicted, compressor, correct, processing_time_ms, cutoff, top_matches'
    );
  });

  it('should point at the offending row', () => {
    const bad = formatCsvRow(toRow(result({ ncd: 2 })));
    expect(() => parseResultsCsv(`${HEADER}\n${formatCsvRow(toRow(result()))}\n${bad}\n`)).toThrow('Invalid results row 3');
  });

  it('should reject a corrupt match list', () => {
    const line = formatCsvRow(toRow(result({ topMatches: [{ trackId: 'song1', ncd: 0.25 }] }))).replace(/,5:song1$/, ',9:oops');
    expect(() => parseResultsCsv(`${HEADER}\n${line}\n`)).toThrow('top_matches Match list entry at offset 0 runs past the end');
  });
});

describe('result files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('should append rows under a single header', async () => {
    const file = path.join(dir, 'results', 'identification_results.csv');
    const writer = await CsvResultWriter.open(file);
    await Promise.all([writer.append(result()), writer.append(result({ compressor: Algorithm.LZMA }))]);

    const reopened = await CsvResultWriter.open(file);
    await reopened.append(result({ noiseLevel: 0.1 }));

    const lines = (await fs.readFile(file, 'utf-8')).trimEnd().split('\n');
    expect(lines[0]).toBe(HEADER);
    expect(lines).toHaveLength(4);

    const rows = await readResultsCsv(file);
    expect(rows.map(r => [r.compressor, r.noiseLevel])).toEqual([['gzip', 0], ['lzma', 0], ['gzip', 0.1]]);
    expect(rows[0].topMatches).toEqual(['song1', 'song, "two"']);
  });

  it('should start over when asked to truncate', async () => {
    const file = path.join(dir, 'results.csv');
    const writer = await CsvResultWriter.open(file);
    await writer.append(result());

    await CsvResultWriter.open(file, { truncate: true });

    expect(await fs.readFile(file, 'utf-8')).toBe(`${HEADER}\n`);
  });

  it('should dump results as JSON', async () => {
    const file = path.join(dir, 'out', 'identification_results.json');
    await writeResultsJson(file, [result()]);

    expect(await fs.readJson(file)).toEqual([result()]);
  });
});
