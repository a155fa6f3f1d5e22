/**
 * File provider — resolves an attached file reference to a descriptor and an
 * in-memory Table.
 *
 * Files live flat under the upload directory. The size limit is checked
 * against the file's metadata before any content is read. Parsed tables are
 * kept in a small LRU keyed by content hash, so describe() followed by load()
 * parses once.
 */

import { createHash } from 'node:crypto';
import { readFile, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { LRUCache } from 'lru-cache';
import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import type { Cell, FileDescriptor, Table } from '../ai/types.js';
import { NotFoundError, PayloadTooLargeError, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const SUPPORTED_EXTENSIONS = ['.csv', '.tsv', '.xlsx', '.xls'] as const;

const SAFE_REF_RE = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const PARSED_CACHE_MAX = 4;

export interface FileProvider {
  describe(ref: string): Promise<FileDescriptor>;
  load(ref: string): Promise<Table>;
}

export interface FileProviderDeps {
  uploadDir: string;
  maxBytes: number;
}

function isSupported(extension: string): boolean {
  return SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export function toCell(value: unknown): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
  }
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return value;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  return String(value);
}

/** Blank headers get a positional name; repeated headers get a numeric suffix. */
export function normalizeHeaders(raw: unknown[]): string[] {
  const seen = new Map<string, number>();
  return raw.map((value, index) => {
    const base = value === null || value === undefined || String(value).trim() === ''
      ? `column_${index + 1}`
      : String(value).trim();
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}_${count + 1}`;
  });
}

function toTable(records: unknown[][]): Table {
  const [header, ...body] = records;
  if (!header || header.length === 0) {
    throw new ValidationError('The attached file has no header row.');
  }

  const columns = normalizeHeaders(header);
  const rows = body.map((record) => columns.map((_, index) => toCell(record[index])));
  return { columns, rows };
}

export function parseDelimited(text: string, delimiter?: string): Table {
  const result = Papa.parse<unknown[]>(text.replace(/^\uFEFF/, ''), {
    header: false,
    dynamicTyping: true,
    skipEmptyLines: true,
    ...(delimiter ? { delimiter } : {}),
  });

  if (result.errors.length > 0) {
    logger.warn(
      { errorCount: result.errors.length, firstError: result.errors[0]?.message },
      'File provider: delimited file parsed with errors',
    );
  }

  return toTable(result.data);
}

export function parseWorkbook(buffer: Buffer): Table {
  const workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });
  const sheetName = workbook.SheetNames[0];
  const worksheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!worksheet) {
    throw new ValidationError('The attached workbook has no sheets.');
  }

  const records = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
    header: 1,
    defval: null,
    blankrows: false,
  });
  return toTable(records);
}

export function createFileProvider(deps: FileProviderDeps): FileProvider {
  const { uploadDir, maxBytes } = deps;
  const parsed = new LRUCache<string, Table>({ max: PARSED_CACHE_MAX });

  function resolvePath(ref: string): { path: string; extension: string } {
    if (!SAFE_REF_RE.test(ref) || ref.includes('..')) {
      throw new ValidationError(`Invalid file reference: ${ref}`);
    }
    const extension = extname(ref).toLowerCase();
    if (!isSupported(extension)) {
      throw new ValidationError(
        `Unsupported file type "${extension || ref}". Supported: ${SUPPORTED_EXTENSIONS.join(', ')}`,
      );
    }
    return { path: join(uploadDir, ref), extension };
  }

  async function read(ref: string): Promise<{ descriptor: FileDescriptor; table: Table }> {
    const { path, extension } = resolvePath(ref);

    let sizeBytes: number;
    try {
      sizeBytes = (await stat(path)).size;
    } catch (err) {
      if (isMissingFile(err)) throw new NotFoundError(`Attached file not found: ${ref}`);
      throw err;
    }

    if (sizeBytes > maxBytes) {
      throw new PayloadTooLargeError(sizeBytes, maxBytes);
    }

    const buffer = await readFile(path);
    const contentHash = createHash('sha256').update(buffer).digest('hex');

    let table = parsed.get(contentHash);
    if (!table) {
      const startTime = Date.now();
      table =
        extension === '.xlsx' || extension === '.xls'
          ? parseWorkbook(buffer)
          : parseDelimited(buffer.toString('utf8'), extension === '.tsv' ? '\t' : undefined);
      parsed.set(contentHash, table);

      logger.info(
        { ref, sizeBytes, rows: table.rows.length, columns: table.columns.length, durationMs: Date.now() - startTime },
        'File provider: file parsed',
      );
    }

    return {
      descriptor: { ref, name: ref, sizeBytes, contentHash, columns: [...table.columns] },
      table,
    };
  }

  return {
    async describe(ref) {
      return (await read(ref)).descriptor;
    },
    async load(ref) {
      return (await read(ref)).table;
    },
  };
}
