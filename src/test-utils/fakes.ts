/**
 * 테스트용 가짜 협력자
 * 외부 명령(dpkg, apt 등)을 실행하지 않고 프로세스 안에서 응답한다.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import type { ArchiveIdentity, PackageRecord } from '../types';
import type { CommandResult, CommandRunner, RunOptions } from '../core/shared/command-runner';
import { basePackageName, parseDebControlFields, stripEpoch, type DebInspector } from '../core/shared/deb-control';
import type { Repacker, RepackOutcome } from '../core/builder/repacker';

export interface RecordedCall {
  command: string;
  args: string[];
  options?: RunOptions;
}

export type CommandHandler = (
  args: string[],
  options?: RunOptions
) => Partial<CommandResult> | Promise<Partial<CommandResult>>;

/**
 * 명령별 응답을 등록하는 실행기. 등록되지 않은 명령은 exit 0, 빈 출력
 */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly handlers = new Map<string, CommandHandler>();
  private readonly tools: Set<string>;

  constructor(tools: string[] = []) {
    this.tools = new Set(tools);
  }

  on(command: string, handler: CommandHandler): this {
    this.handlers.set(command, handler);
    this.tools.add(command);
    return this;
  }

  withTools(...tools: string[]): this {
    for (const tool of tools) this.tools.add(tool);
    return this;
  }

  withoutTools(...tools: string[]): this {
    for (const tool of tools) this.tools.delete(tool);
    return this;
  }

  async run(command: string, args: string[], options?: RunOptions): Promise<CommandResult> {
    this.calls.push({ command, args, options });
    const handler = this.handlers.get(command);
    const partial = handler ? await handler(args, options) : {};
    const result: CommandResult = {
      exitCode: partial.exitCode ?? 0,
      stdout: partial.stdout ?? '',
      stderr: partial.stderr ?? '',
    };
    if (result.stdout) options?.onOutput?.(result.stdout);
    return result;
  }

  async which(command: string): Promise<boolean> {
    return this.tools.has(command);
  }

  /** `command arg1 arg2` 형태의 호출 목록 */
  commandLines(): string[] {
    return this.calls.map((call) => [call.command, ...call.args].join(' '));
  }
}

/**
 * 컨트롤 필드 텍스트를 내용으로 갖는 가짜 .deb 작성
 */
export async function writeFakeDeb(filePath: string, identity: ArchiveIdentity, extra = ''): Promise<string> {
  await fs.ensureDir(path.dirname(filePath));
  const lines: string[] = [];
  if (identity.name) lines.push(`Package: ${identity.name}`);
  if (identity.version) lines.push(`Version: ${identity.version}`);
  if (identity.architecture) lines.push(`Architecture: ${identity.architecture}`);
  await fs.writeFile(filePath, lines.join('\n') + '\n' + extra, 'utf-8');
  return filePath;
}

/**
 * 가짜 .deb의 내용을 컨트롤 필드로 읽는 검사기
 */
export class FakeDebInspector implements DebInspector {
  readonly inspected: string[] = [];

  async readIdentity(debPath: string): Promise<ArchiveIdentity> {
    this.inspected.push(debPath);
    const fields = parseDebControlFields(await fs.readFile(debPath, 'utf-8'));
    return {
      name: fields.get('Package') ?? '',
      version: fields.get('Version') ?? '',
      architecture: fields.get('Architecture') ?? '',
    };
  }
}

export type FakeRepackBehavior =
  | { kind: 'ok' }
  | { kind: 'fail'; detail: string }
  | { kind: 'empty' }
  | { kind: 'mismatch'; version: string }
  | { kind: 'throw'; message: string };

/**
 * dpkg-repack 흉내. 기본 동작은 `name_version_arch.deb`(epoch 제거) 생성
 */
export class FakeRepacker implements Repacker {
  readonly repacked: string[] = [];
  private readonly behaviors = new Map<string, FakeRepackBehavior>();

  constructor(private readonly available = true) {}

  setBehavior(name: string, behavior: FakeRepackBehavior): this {
    this.behaviors.set(name, behavior);
    return this;
  }

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async repack(record: PackageRecord, workDir: string): Promise<RepackOutcome> {
    this.repacked.push(record.name);
    const behavior = this.behaviors.get(record.name) ?? { kind: 'ok' };

    switch (behavior.kind) {
      case 'fail':
        return { ok: false, detail: behavior.detail };
      case 'empty':
        return { ok: true, files: [] };
      case 'throw':
        throw new Error(behavior.message);
      case 'mismatch': {
        // 레코드와 다른 버전의 아카이브를 만든다
        const name = basePackageName(record.name);
        const file = path.join(workDir, `${name}_${stripEpoch(behavior.version)}_${record.architecture}.deb`);
        await writeFakeDeb(file, { name, version: behavior.version, architecture: record.architecture });
        return { ok: true, files: [file] };
      }
      case 'ok': {
        const name = basePackageName(record.name);
        const file = path.join(workDir, `${name}_${stripEpoch(record.version)}_${record.architecture}.deb`);
        await writeFakeDeb(file, { name, version: record.version, architecture: record.architecture });
        return { ok: true, files: [file] };
      }
    }
  }
}
