import { readFileSync } from 'node:fs';
import { createBarData } from '../bars/bar-data.js';
import { createChildLogger } from '../logger.js';
import type { BarData } from '../types/index.js';

const log = createChildLogger('csv-loader');

export interface CsvLoaderOptions {
  readonly dateCol?: string;
  readonly openCol?: string;
  readonly highCol?: string;
  readonly lowCol?: string;
  readonly closeCol?: string;
  readonly volumeCol?: string;
  /** strict: 첫 불량 행에서 throw / skip: 불량 행은 버리고 rejected에 기록 */
  readonly mode?: 'strict' | 'skip';
}

export interface RejectedRow {
  readonly line: number;
  readonly reason: string;
}

export interface CsvLoadResult {
  readonly bars: BarData[];
  readonly rejected: RejectedRow[];
}

const DEFAULTS: Required<CsvLoaderOptions> = {
  dateCol: 'date',
  openCol: 'open',
  highCol: 'high',
  lowCol: 'low',
  closeCol: 'close',
  volumeCol: 'volume',
  mode: 'strict',
};

function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i]!;
    if (inQuotes) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        current += ch;
      }
    } else {
      if (ch === '"') {
        inQuotes = true;
      } else if (ch === ',') {
        fields.push(current.trim());
        current = '';
      } else {
        current += ch;
      }
    }
  }
  fields.push(current.trim());
  return fields;
}

function parseDate(value: string): Date {
  const num = Number(value);
  if (value !== '' && !Number.isNaN(num)) {
    // seconds → ms 변환 (10자리 이하면 초 단위로 간주)
    return new Date(value.length <= 10 ? num * 1000 : num);
  }
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new Error(`Invalid date: ${value}`);
  }
  return new Date(ms);
}

/** 빈 칸은 기본값(0)으로 */
function parseNumber(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

/**
 * OHLCV CSV → BarData[] (날짜순)
 * 각 행은 createBarData로 검증. 불량 봉을 보정하지 않음.
 */
export function loadBarsCsv(filePath: string, options?: CsvLoaderOptions): CsvLoadResult {
  const opts = { ...DEFAULTS, ...options };
  const raw = readFileSync(filePath, 'utf-8');
  const lines = raw.split(/\r?\n/).filter((l) => l.trim().length > 0);

  if (lines.length < 2) {
    throw new Error('CSV must have header + at least 1 data row');
  }

  const header = parseCsvLine(lines[0]!);
  const colIndex = (name: string): number => {
    const idx = header.indexOf(name);
    if (idx === -1) {
      throw new Error(`Column "${name}" not found. Available: ${header.join(', ')}`);
    }
    return idx;
  };

  const di = colIndex(opts.dateCol);
  const oi = colIndex(opts.openCol);
  const hi = colIndex(opts.highCol);
  const li = colIndex(opts.lowCol);
  const ci = colIndex(opts.closeCol);
  const vi = colIndex(opts.volumeCol);

  const parsed: Array<{ bar: BarData; line: number }> = [];
  const rejected: RejectedRow[] = [];

  const reject = (line: number, reason: string): void => {
    if (opts.mode === 'strict') {
      throw new Error(`Line ${line}: ${reason}`);
    }
    log.warn({ line, reason }, 'Skipped invalid bar');
    rejected.push({ line, reason });
  };

  for (let i = 1; i < lines.length; i++) {
    const lineNum = i + 1;
    const fields = parseCsvLine(lines[i]!);

    let reason: string;
    try {
      const result = createBarData({
        date: parseDate(fields[di] ?? ''),
        open: parseNumber(fields[oi]),
        high: parseNumber(fields[hi]),
        low: parseNumber(fields[li]),
        close: parseNumber(fields[ci]),
        volume: parseNumber(fields[vi]),
      });
      if (result.success) {
        parsed.push({ bar: result.data, line: lineNum });
        continue;
      }
      reason = result.error.message;
    } catch (err) {
      reason = err instanceof Error ? err.message : String(err);
    }

    reject(lineNum, reason);
  }

  // 시간순 정렬 (안정 정렬 — 같은 날짜는 파일 순서 유지)
  parsed.sort((a, b) => a.bar.date.getTime() - b.bar.date.getTime());

  // 중복 날짜: 먼저 나온 행을 남기고 뒤의 행을 거부
  const bars: BarData[] = [];
  for (const { bar, line } of parsed) {
    const prev = bars[bars.length - 1];
    if (prev && prev.date.getTime() === bar.date.getTime()) {
      reject(line, `Duplicate date: ${bar.date.toISOString()}`);
      continue;
    }
    bars.push(bar);
  }
  rejected.sort((a, b) => a.line - b.line);

  return { bars, rejected };
}
