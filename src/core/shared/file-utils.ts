/**
 * 풀 디렉토리 파일 유틸리티
 * 풀은 추가 전용이므로 복사/이동은 모두 덮어쓰지 않는다.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import * as crypto from 'crypto';

/** 덮어쓰지 않는 복사/이동 결과 */
export type NoClobberResult = 'written' | 'exists';

/**
 * 디렉토리 아래의 모든 .deb 파일 (재귀, 경로순 정렬)
 */
export async function listDebFiles(dir: string): Promise<string[]> {
  if (!(await fs.pathExists(dir))) {
    return [];
  }

  const found: string[] = [];
  const walk = async (current: string): Promise<void> => {
    const entries = await fs.promises.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile() && entry.name.endsWith('.deb')) {
        found.push(fullPath);
      }
    }
  };

  await walk(dir);
  return found.sort();
}

/**
 * 대상이 이미 있으면 건드리지 않는 복사 (`cp -n`)
 */
export async function copyNoClobber(src: string, dest: string): Promise<NoClobberResult> {
  try {
    await fs.promises.copyFile(src, dest, fs.constants.COPYFILE_EXCL);
    return 'written';
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'EEXIST') {
      return 'exists';
    }
    throw error;
  }
}

/**
 * 대상이 이미 있으면 건드리지 않는 이동
 * 같은 파일시스템에서는 link + unlink로 원자적으로 처리하고, 아니면 복사 후 삭제
 */
export async function moveNoClobber(src: string, dest: string): Promise<NoClobberResult> {
  try {
    await fs.promises.link(src, dest);
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'EEXIST') {
      await fs.remove(src);
      return 'exists';
    }
    if (code !== 'EXDEV' && code !== 'EPERM') {
      throw error;
    }
    const copied = await copyNoClobber(src, dest);
    await fs.remove(src);
    return copied;
  }
  await fs.remove(src);
  return 'written';
}

/**
 * 파일 SHA-256 (스트리밍)
 */
export function sha256File(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    const stream = fs.createReadStream(filePath);
    stream.on('error', reject);
    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('end', () => resolve(hash.digest('hex')));
  });
}

/**
 * 바이트를 읽기 쉬운 형식으로
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(2))} ${sizes[i]}`;
}
