/**
 * debsnap 로거 (winston 싱글톤)
 *
 * initialize() 전: stderr 콘솔, warn 이상 (테스트와 설정 로드 중)
 * initialize() 후: 설정 디렉토리의 일별 회전 파일 + error 전용 파일
 * openRunLog(): 설치 한 번의 전체 기록을 별도 파일에 함께 남긴다
 */

import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { getConfigManager, type Config } from '../core/config';

type Meta = Record<string, unknown>;
type Level = Config['logLevel'];

const ROTATION = { datePattern: 'YYYY-MM-DD', maxSize: '20m', maxFiles: '30d' } as const;

function render(head: string, message: unknown, meta: Meta, stack: unknown): string {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  const trace = typeof stack === 'string' ? `\n${stack}` : '';
  return `${head} ${String(message)}${extra}${trace}`;
}

// 파일: `[2024-01-01 00:00:00] INFO  메시지 {...}`
const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) =>
    render(`[${String(timestamp)}] ${level.toUpperCase().padEnd(5)}`, message, meta, stack)
  )
);

// 콘솔: 레벨만 색상
const consoleFormat = winston.format.combine(
  winston.format.colorize({ level: true }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, stack, ...meta }) => render(`${level}:`, message, meta, stack))
);

/**
 * 실행 단위 로그 파일. 실행이 끝나면 반드시 close()
 */
export interface RunLog {
  readonly file: string;
  close(): void;
}

class DebsnapLogger {
  private logger = winston.createLogger({
    level: 'warn',
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      }),
    ],
  });
  private initialized = false;

  /**
   * 설정의 logsDir/logLevel로 파일 로깅 시작 (CLI 명령 실행 전 한 번)
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    const configManager = getConfigManager();
    await configManager.ensureDirectories();
    const logsDir = configManager.getLogsDir();
    const level: Level = configManager.getConfig().logLevel;

    this.logger = winston.createLogger({
      level,
      format: fileFormat,
      transports: [
        new DailyRotateFile({ ...ROTATION, dirname: logsDir, filename: 'debsnap-%DATE%.log' }),
        new DailyRotateFile({ ...ROTATION, dirname: logsDir, filename: 'error-%DATE%.log', level: 'error' }),
      ],
    });
    this.initialized = true;
    this.debug('로거 초기화', { logsDir, level });
  }

  /**
   * filePath에 info 이상을 함께 기록. 전역 레벨과 무관하게 info부터 남긴다.
   */
  openRunLog(filePath: string): RunLog {
    const transport = new winston.transports.File({ filename: filePath, level: 'info', format: fileFormat });
    this.logger.add(transport);
    // remove()가 unpipe 되면서 파일 스트림을 닫는다
    return {
      file: filePath,
      close: () => {
        this.logger.remove(transport);
      },
    };
  }

  error(message: string, meta?: Meta): void {
    this.logger.error(message, meta);
  }

  warn(message: string, meta?: Meta): void {
    this.logger.warn(message, meta);
  }

  info(message: string, meta?: Meta): void {
    this.logger.info(message, meta);
  }

  debug(message: string, meta?: Meta): void {
    this.logger.debug(message, meta);
  }
}

const logger = new DebsnapLogger();

export default logger;
