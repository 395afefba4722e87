import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import fs from 'fs-extra';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerOptions {
  /** 로그 레벨 (기본 info) */
  level?: LogLevel;
  /** 콘솔 출력 여부 (기본 true) */
  console?: boolean;
  /** 모든 출력 끄기 (테스트용) */
  silent?: boolean;
}

// 로그 포맷 정의
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    let log = `[${String(timestamp)}] [${level.toUpperCase()}] ${String(message)}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    if (stack) {
      log += `\n${String(stack)}`;
    }
    return log;
  })
);

// 콘솔용 컬러 포맷
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let log = `[${String(timestamp)}] ${level}: ${String(message)}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    return log;
  })
);

class Logger {
  private logger: winston.Logger;
  private options: LoggerOptions;
  private fileLogging = false;

  constructor(options: LoggerOptions = {}) {
    this.options = options;
    const transports: winston.transport[] = [];
    if (options.console !== false) {
      transports.push(new winston.transports.Console({ format: consoleFormat }));
    }

    this.logger = winston.createLogger({
      level: options.level ?? 'info',
      format: logFormat,
      silent: options.silent ?? false,
      transports,
    });
  }

  /**
   * 파일 로깅을 켭니다. 일자별로 로테이션됩니다.
   */
  async enableFileLogging(logsDir: string): Promise<void> {
    if (this.fileLogging) return;

    await fs.ensureDir(logsDir);

    this.logger.add(
      new DailyRotateFile({
        dirname: logsDir,
        filename: 'repomirror-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        maxSize: '20m',
        maxFiles: '30d',
        format: logFormat,
      })
    );

    // 에러 전용 파일
    this.logger.add(
      new DailyRotateFile({
        dirname: logsDir,
        filename: 'error-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        maxSize: '20m',
        maxFiles: '30d',
        level: 'error',
        format: logFormat,
      })
    );

    this.fileLogging = true;
    this.debug('파일 로깅 시작', { logsDir, level: this.options.level ?? 'info' });
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  /**
   * 버퍼에 남은 로그를 비우고 트랜스포트를 닫습니다.
   */
  close(): Promise<void> {
    return new Promise((resolve) => {
      this.logger.on('finish', () => resolve());
      this.logger.end();
    });
  }
}

/**
 * 테스트용 무음 로거
 */
export function createSilentLogger(): Logger {
  return new Logger({ silent: true, console: false });
}

export { Logger };
