/**
 * APT 소스 설정 읽기/쓰기
 * 한 줄 형식(sources.list, *.list)과 deb822 형식(*.sources)을 모두 다룬다.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import type { SourceEntry, SourceSet } from '../../types';
import { errorMessage } from '../errors';

/**
 * 플랫 저장소용 소스 한 줄
 * 예: deb [trusted=yes] file:/opt/offline-repo ./
 */
export function formatSourceLine(repoDir: string, trusted: boolean): string {
  return `deb ${trusted ? '[trusted=yes] ' : ''}file:${repoDir} ./`;
}

/**
 * `[a=b c=d]` 옵션 파싱
 */
function parseOptions(text: string): Record<string, string> {
  const options: Record<string, string> = {};
  for (const token of text.trim().split(/\s+/).filter(Boolean)) {
    const eq = token.indexOf('=');
    if (eq > 0) {
      options[token.substring(0, eq)] = token.substring(eq + 1);
    }
  }
  return options;
}

/**
 * 한 줄 형식 파싱. 주석과 빈 줄은 무시하고, deb822 `URIs:` 줄도 활성 엔트리로 잡는다.
 */
export function parseSourceList(text: string, file: string): SourceEntry[] {
  const entries: SourceEntry[] = [];
  const lines = text.split('\n');

  lines.forEach((rawLine, i) => {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (!line) return;

    const deb = line.match(/^(deb|deb-src)\s+(?:\[([^\]]*)\]\s+)?(\S+)/);
    if (deb) {
      entries.push({
        file,
        line: i + 1,
        format: 'list',
        uris: [deb[3]],
        options: deb[2] ? parseOptions(deb[2]) : {},
        raw: rawLine.trim(),
      });
      return;
    }

    const uris = line.match(/^URIs:\s*(.*)$/);
    if (uris) {
      entries.push({
        file,
        line: i + 1,
        format: 'deb822',
        uris: uris[1].split(/\s+/).filter(Boolean),
        options: {},
        raw: rawLine.trim(),
      });
    }
  });

  return entries;
}

/**
 * deb822 형식 파싱
 * `Enabled: no` 스탠자도 엔트리로 남긴다 (격리 검사는 보수적으로 본다).
 */
export function parseDeb822Sources(text: string, file: string): SourceEntry[] {
  const entries: SourceEntry[] = [];
  const lines = text.split('\n');

  let stanzaStart = -1;
  let fields: Record<string, string> = {};
  let uriLine = -1;

  const flush = (): void => {
    const uris = fields.uris;
    if (uris !== undefined) {
      const options: Record<string, string> = {};
      for (const key of ['trusted', 'enabled', 'signed-by', 'architectures']) {
        const value = fields[key];
        if (value !== undefined) options[key] = value;
      }
      entries.push({
        file,
        line: uriLine,
        format: 'deb822',
        uris: uris.split(/\s+/).filter(Boolean),
        options,
        raw: `URIs: ${uris}`,
      });
    }
    stanzaStart = -1;
    fields = {};
    uriLine = -1;
  };

  lines.forEach((rawLine, i) => {
    if (rawLine.trim().startsWith('#')) return;
    if (rawLine.trim() === '') {
      if (stanzaStart !== -1) flush();
      return;
    }
    if (stanzaStart === -1) stanzaStart = i + 1;

    if (/^\s/.test(rawLine)) return; // 연속 줄 (Signed-By 키 블록 등)
    const colon = rawLine.indexOf(':');
    if (colon <= 0) return;
    // 필드 이름은 대소문자 구분 없음
    const key = rawLine.substring(0, colon).trim().toLowerCase();
    fields[key] = rawLine.substring(colon + 1).trim();
    if (key === 'uris') uriLine = i + 1;
  });
  flush();

  return entries;
}

/**
 * 설정 파일 하나 파싱 (확장자로 형식 결정)
 */
export function parseSourceFile(text: string, file: string): SourceEntry[] {
  return file.endsWith('.sources') ? parseDeb822Sources(text, file) : parseSourceList(text, file);
}

/**
 * 활성 소스 설정 위치의 파일 목록
 * sources.list와 sources.list.d 아래의 모든 일반 파일 (확장자 무관, 재귀)
 */
export async function listSourceFiles(aptDir: string): Promise<string[]> {
  const files: string[] = [];
  const mainList = path.join(aptDir, 'sources.list');
  if (await fs.pathExists(mainList)) {
    files.push(mainList);
  }

  const walk = async (dir: string): Promise<void> => {
    if (!(await fs.pathExists(dir))) return;
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else {
        files.push(fullPath);
      }
    }
  };
  await walk(path.join(aptDir, 'sources.list.d'));

  return files;
}

/**
 * 호스트의 활성 소스 설정 읽기
 */
export async function readSourceSet(aptDir: string): Promise<SourceSet> {
  const files = await listSourceFiles(aptDir);
  const set: SourceSet = { files, entries: [], unreadable: [] };
  for (const file of files) {
    let text: string;
    try {
      text = await fs.readFile(file, 'utf-8');
    } catch (error) {
      set.unreadable.push({ file, error: errorMessage(error) });
      continue;
    }
    set.entries.push(...parseSourceFile(text, file));
  }
  return set;
}

/**
 * file: URI를 로컬 경로로 (file:/x, file:///x)
 */
export function fileUriToPath(uri: string): string | null {
  const match = uri.match(/^file:(?:\/\/)?(\/.*)$/);
  if (!match) return null;
  const p = match[1].replace(/\/+$/, '');
  return p === '' ? '/' : p;
}

/**
 * 엔트리의 모든 URI가 주어진 로컬 저장소를 가리키는지 확인
 */
export function entryReferences(entry: SourceEntry, repoDir: string): boolean {
  const target = path.resolve(repoDir);
  return entry.uris.length > 0 && entry.uris.every((uri) => fileUriToPath(uri) === target);
}
