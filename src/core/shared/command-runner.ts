/**
 * 외부 명령 실행기
 * dpkg/apt 계열 도구는 모두 이 인터페이스를 통해 호출하며, 테스트에서는 가짜 구현으로 대체한다.
 */

import { spawn } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { CommandError, DebsnapError, type DebsnapErrorCode } from '../errors';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** stdout/stderr 청크를 받을 콜백 (로그 tee 용) */
  onOutput?: (chunk: string) => void;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
  /** PATH에서 실행 가능한 명령인지 확인 (`command -v` 대응) */
  which(command: string): Promise<boolean>;
}

/**
 * child_process 기반 실행기
 */
export class SpawnCommandRunner implements CommandRunner {
  run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    return new Promise<CommandResult>((resolve) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';

      child.stdout.setEncoding('utf-8');
      child.stderr.setEncoding('utf-8');

      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
        options.onOutput?.(chunk);
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
        options.onOutput?.(chunk);
      });

      child.on('close', (code) => {
        resolve({ exitCode: code ?? 1, stdout, stderr });
      });

      // 실행 파일이 없는 경우 등은 셸과 같이 127로 취급
      child.on('error', (err) => {
        resolve({ exitCode: 127, stdout, stderr: stderr + err.message });
      });
    });
  }

  async which(command: string): Promise<boolean> {
    const dirs = (process.env.PATH ?? '').split(path.delimiter).filter(Boolean);
    for (const dir of dirs) {
      try {
        await fs.promises.access(path.join(dir, command), fs.constants.X_OK);
        return true;
      } catch {
        // 다음 디렉토리 확인
      }
    }
    return false;
  }
}

/**
 * 종료 코드가 0이 아니면 CommandError를 던지는 실행
 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: string[],
  options?: RunOptions,
  code?: DebsnapErrorCode
): Promise<CommandResult> {
  const result = await runner.run(command, args, options);
  if (result.exitCode !== 0) {
    throw new CommandError([command, ...args].join(' '), result, code);
  }
  return result;
}

/**
 * 필수 도구가 모두 있는지 확인
 */
export async function requireTools(runner: CommandRunner, tools: string[]): Promise<void> {
  const missing: string[] = [];
  for (const tool of tools) {
    if (!(await runner.which(tool))) {
      missing.push(tool);
    }
  }
  if (missing.length > 0) {
    throw new DebsnapError('MISSING_TOOL', `필수 도구가 없습니다: ${missing.join(', ')}`, {
      context: { missing },
    });
  }
}
