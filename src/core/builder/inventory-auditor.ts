/**
 * 인벤토리 감사기
 * 풀 안의 모든 .deb에 대해 한 줄씩 (패키지, 버전, 아키텍처, 크기, 경로, SHA-256)을 기록한다.
 * 감사/디버깅용 산출물이며 인덱스 생성에는 사용하지 않는다.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import type { ArchiveIdentity, InventoryRow } from '../../types';
import type { DebInspector } from '../shared/deb-control';
import { listDebFiles, sha256File } from '../shared/file-utils';
import { getRelativePath } from '../shared/path-utils';
import { runBounded } from '../shared/worker-pool';
import { errorMessage } from '../errors';
import logger from '../../utils/logger';

export const INVENTORY_FILENAME = 'installed-packages.csv';
export const INVENTORY_HEADER = 'Package,Version,Architecture,Size,Filename,SHA256';

export interface InventoryFailure {
  path: string;
  error: string;
}

export interface InventoryReport {
  csvPath: string;
  rows: InventoryRow[];
  failures: InventoryFailure[];
}

export interface AuditOptions {
  concurrency: number;
  onProgress?: (completed: number, total: number) => void;
}

/**
 * CSV 필드 이스케이프 (쉼표, 따옴표, 줄바꿈이 있을 때만 인용)
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatInventoryRow(row: InventoryRow): string {
  return [row.package, row.version, row.architecture, String(row.sizeBytes), row.relativePath, row.sha256]
    .map(escapeCsvField)
    .join(',');
}

/**
 * CSV 한 줄을 필드로 분리 (인용 필드 지원)
 */
export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}

/**
 * 인벤토리 CSV 파싱. 헤더가 없거나 다르면 에러
 */
export function parseInventory(text: string): InventoryRow[] {
  const lines = text.split('\n').filter((line) => line.trim() !== '');
  if (lines[0]?.trim() !== INVENTORY_HEADER) {
    throw new Error('인벤토리 헤더가 올바르지 않습니다');
  }

  return lines.slice(1).map((line, i) => {
    const fields = splitCsvLine(line);
    if (fields.length !== 6) {
      throw new Error(`인벤토리 ${i + 2}번째 줄의 필드 수가 6이 아닙니다`);
    }
    const [pkg, version, architecture, size, relativePath, sha256] = fields;
    return { package: pkg, version, architecture, sizeBytes: Number(size), relativePath, sha256 };
  });
}

type RowOutcome = { ok: true; row: InventoryRow } | { ok: false; failure: InventoryFailure };

const EMPTY_IDENTITY: ArchiveIdentity = { name: '', version: '', architecture: '' };

/**
 * 파일 하나의 인벤토리 행 계산. 메타데이터는 필드 단위로 빈 문자열 대체
 */
async function buildRow(inspector: DebInspector, repoDir: string, debPath: string): Promise<InventoryRow> {
  let identity: ArchiveIdentity;
  try {
    identity = await inspector.readIdentity(debPath);
  } catch (error) {
    logger.warn('아카이브 메타데이터 읽기 실패', { path: debPath, error: errorMessage(error) });
    identity = EMPTY_IDENTITY;
  }

  const stat = await fs.stat(debPath);
  const sha256 = await sha256File(debPath);

  return {
    package: identity.name,
    version: identity.version,
    architecture: identity.architecture,
    sizeBytes: stat.size,
    relativePath: getRelativePath(debPath, repoDir),
    sha256,
  };
}

/**
 * 풀 전체 감사 후 CSV 작성
 * 행은 워커에서 완성된 뒤 한 번에 기록되므로 행 내부가 섞이지 않는다.
 */
export async function auditInventory(
  inspector: DebInspector,
  repoDir: string,
  options: AuditOptions
): Promise<InventoryReport> {
  const poolDir = path.join(repoDir, 'pool');
  const csvPath = path.join(repoDir, INVENTORY_FILENAME);
  const files = await listDebFiles(poolDir);

  const outcomes = await runBounded<string, RowOutcome>(
    files,
    async (debPath) => ({ ok: true, row: await buildRow(inspector, repoDir, debPath) }),
    {
      concurrency: options.concurrency,
      onError: (error, debPath) => ({ ok: false, failure: { path: debPath, error: errorMessage(error) } }),
      onSettled: (_result, completed, total) => options.onProgress?.(completed, total),
    }
  );

  const rows: InventoryRow[] = [];
  const failures: InventoryFailure[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      rows.push(outcome.row);
    } else {
      failures.push(outcome.failure);
    }
  }

  const lines = [INVENTORY_HEADER, ...rows.map(formatInventoryRow)];
  await fs.writeFile(csvPath, lines.join('\n') + '\n', 'utf-8');

  if (failures.length > 0) {
    logger.warn('일부 파일을 감사하지 못했습니다', { count: failures.length });
  }
  logger.info('인벤토리 작성 완료', { csvPath, rows: rows.length });

  return { csvPath, rows, failures };
}

export interface HashMismatch {
  relativePath: string;
  expected: string;
  actual: string;
}

export interface InventoryVerification {
  checked: number;
  mismatched: HashMismatch[];
  /** CSV에는 있지만 디스크에 없는 파일 */
  missing: string[];
  /** 풀에는 있지만 CSV에 없는 파일 */
  unlisted: string[];
}

/**
 * 인벤토리 CSV와 실제 파일의 해시를 다시 비교
 */
export async function verifyInventory(repoDir: string, concurrency: number): Promise<InventoryVerification> {
  const rows = parseInventory(await fs.readFile(path.join(repoDir, INVENTORY_FILENAME), 'utf-8'));
  const listed = new Set(rows.map((row) => row.relativePath));

  type Check = { kind: 'ok' } | { kind: 'missing' } | { kind: 'mismatch'; actual: string };
  const checks = await runBounded<InventoryRow, Check>(
    rows,
    async (row) => {
      const filePath = path.join(repoDir, row.relativePath);
      if (!(await fs.pathExists(filePath))) {
        return { kind: 'missing' };
      }
      const actual = await sha256File(filePath);
      return actual === row.sha256 ? { kind: 'ok' } : { kind: 'mismatch', actual };
    },
    {
      concurrency,
      onError: (error) => ({ kind: 'mismatch', actual: `error: ${errorMessage(error)}` }),
    }
  );

  const result: InventoryVerification = { checked: rows.length, mismatched: [], missing: [], unlisted: [] };
  checks.forEach((check, i) => {
    const row = rows[i];
    if (check.kind === 'missing') {
      result.missing.push(row.relativePath);
    } else if (check.kind === 'mismatch') {
      result.mismatched.push({ relativePath: row.relativePath, expected: row.sha256, actual: check.actual });
    }
  });

  for (const file of await listDebFiles(path.join(repoDir, 'pool'))) {
    const relativePath = getRelativePath(file, repoDir);
    if (!listed.has(relativePath)) {
      result.unlisted.push(relativePath);
    }
  }

  return result;
}
