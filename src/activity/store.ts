import { createHash, randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join, basename } from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { parseActivityDate } from './dates.js';
import { ActivityLogError } from './errors.js';
import { type ActivityLogSnapshot, type ActivityRecord } from './types.js';
import { logger } from '../logger.js';

const log = logger.child('store');

export const LOG_COLUMNS = ['Date', 'Category', 'Hours'] as const;

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

export const revisionOf = (content: string): string =>
  createHash('sha256').update(content).digest('hex').slice(0, 16);

/**
 * Shortest decimal form, so 2 stays `2` and 1.5 stays `1.5`.
 */
const formatHours = (hours: number): string => String(hours);

export const decodeActivityLog = (content: string): ActivityRecord[] => {
  let rows: string[][];
  try {
    rows = parse(content, { skip_empty_lines: true, relax_column_count: true, bom: true });
  } catch (error) {
    throw new ActivityLogError('ParseFailure', `Activity log is not valid CSV: ${String(error)}`, {}, { cause: error });
  }

  const [rawHeader, ...body] = rows;
  if (rawHeader === undefined) {
    throw new ActivityLogError('ParseFailure', 'Activity log has no header row');
  }
  const header = rawHeader.map(name => name.trim());

  const [dateIdx, categoryIdx, hoursIdx] = LOG_COLUMNS.map(column => header.indexOf(column));
  const missing = LOG_COLUMNS.filter(column => !header.includes(column));
  if (missing.length > 0) {
    throw new ActivityLogError('ParseFailure', `Activity log header is missing column(s): ${missing.join(', ')}`);
  }

  return body.map((cells, index) => {
    const row = index + 1;
    const rawDate = cells[dateIdx] ?? '';
    const date = parseActivityDate(rawDate);
    if (date === undefined) {
      throw new ActivityLogError('ParseFailure', `Row ${row} has an unparseable date "${rawDate}"`, { row, raw: rawDate });
    }
    // Categories keep their whitespace; only the typed cells are trimmed.
    const rawHours = (cells[hoursIdx] ?? '').trim();
    const hours = rawHours === '' ? Number.NaN : Number(rawHours);
    if (!Number.isFinite(hours)) {
      throw new ActivityLogError('ParseFailure', `Row ${row} has a non-numeric hours value "${rawHours}"`, { row, raw: rawHours });
    }
    return { date, category: cells[categoryIdx] ?? '', hours };
  });
};

export const encodeActivityLog = (records: ActivityRecord[]): string =>
  `${LOG_COLUMNS.join(',')}\n` + stringify(records.map(r => [r.date, r.category, formatHours(r.hours)]));

/**
 * Sole owner of the backing CSV file. Every call re-reads the file;
 * every mutation rewrites it in full.
 */
export class ActivityLogStore {
  readonly filePath: string;

  constructor (config: { filePath: string }) {
    this.filePath = config.filePath;
  }

  private async readContent (): Promise<string> {
    try {
      return await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new ActivityLogError('NotFound', `Activity log not found at ${this.filePath}`, { filePath: this.filePath }, { cause: error });
      }
      throw new ActivityLogError('IOFailure', `Unable to read activity log: ${String(error)}`, { filePath: this.filePath }, { cause: error });
    }
  }

  async snapshot (): Promise<ActivityLogSnapshot> {
    const content = await this.readContent();
    const records = decodeActivityLog(content);
    log.debug('Activity log loaded', { filePath: this.filePath, count: records.length });
    return { records, revision: revisionOf(content) };
  }

  async load (): Promise<ActivityRecord[]> {
    return (await this.snapshot()).records;
  }

  async save (records: ActivityRecord[]): Promise<void> {
    const tmpPath = join(dirname(this.filePath), `.${basename(this.filePath)}.${randomUUID()}.tmp`);
    try {
      await writeFile(tmpPath, encodeActivityLog(records), 'utf8');
      await rename(tmpPath, this.filePath);
    } catch (error) {
      await rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        log.warn('Failed to remove temp file', { tmpPath, error: String(cleanupError) });
      });
      throw new ActivityLogError('IOFailure', `Unable to write activity log: ${String(error)}`, { filePath: this.filePath }, { cause: error });
    }
    log.debug('Activity log written', { filePath: this.filePath, count: records.length });
  }

  /**
   * Appends one record and returns its position in load order.
   */
  async append (record: ActivityRecord): Promise<number> {
    const records = await this.load();
    records.push({ ...record });
    await this.save(records);
    log.info('Activity appended', { date: record.date, category: record.category, hours: record.hours });
    return records.length - 1;
  }

  /**
   * Removes the records at the given load-order positions and returns them.
   * Nothing is written when a position is invalid or the revision is stale.
   */
  async delete (positions: Iterable<number>, options: { expectedRevision?: string } = {}): Promise<ActivityRecord[]> {
    const targets = [...new Set(positions)].sort((a, b) => a - b);
    if (targets.length === 0) return [];

    const { records, revision } = await this.snapshot();
    if (options.expectedRevision !== undefined && options.expectedRevision !== revision) {
      throw new ActivityLogError(
        'StaleRevision',
        `Activity log changed since revision ${options.expectedRevision}; reload and retry`,
        { expectedRevision: options.expectedRevision, actualRevision: revision }
      );
    }

    const invalid = targets.filter(p => !Number.isInteger(p) || p < 0 || p >= records.length);
    if (invalid.length > 0) {
      throw new ActivityLogError(
        'OutOfRange',
        `Position(s) ${invalid.join(', ')} outside 0..${records.length - 1}`,
        { positions: invalid }
      );
    }

    const drop = new Set(targets);
    const removed = targets.map(p => records[p]);
    await this.save(records.filter((_, index) => !drop.has(index)));
    log.info('Activities deleted', { positions: targets, remaining: records.length - targets.length });
    return removed;
  }

  /**
   * Creates a header-only log when the file does not exist yet.
   */
  async initialize (): Promise<boolean> {
    try {
      await this.readContent();
      return false;
    } catch (error) {
      if (!(error instanceof ActivityLogError) || error.code !== 'NotFound') throw error;
    }
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
    } catch (error) {
      throw new ActivityLogError('IOFailure', `Unable to create log directory: ${String(error)}`, { filePath: this.filePath }, { cause: error });
    }
    await this.save([]);
    log.info('Created empty activity log', { filePath: this.filePath });
    return true;
  }
}

export const createActivityLogStore = (filePath: string): ActivityLogStore => {
  return new ActivityLogStore({ filePath });
};
