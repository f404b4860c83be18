import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { getConfigManager } from '../core/config';

// 개발 모드 여부
const isDev = process.env.NODE_ENV === 'development';

// 메타데이터는 한 줄 JSON으로 뒤에 붙인다
export function withMeta(line: string, meta: Record<string, unknown>): string {
  return Object.keys(meta).length > 0 ? `${line} ${JSON.stringify(meta)}` : line;
}

// 파일용 포맷
const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) =>
    withMeta(`[${timestamp}] [${level.toUpperCase()}] ${message}`, meta)
  )
);

// 콘솔용 컬러 포맷
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) =>
    withMeta(`[${timestamp}] ${level}: ${message}`, meta)
  )
);

// stdout은 스냅샷 출력용이므로 콘솔 로그는 전부 stderr로 보낸다
const ALL_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

function createConsoleTransport(): winston.transport {
  return new winston.transports.Console({
    format: consoleFormat,
    stderrLevels: ALL_LEVELS,
  });
}

class Logger {
  private logger: winston.Logger;
  private initialized = false;

  constructor() {
    // 기본 로거 생성 (초기화 전 사용)
    this.logger = winston.createLogger({
      level: 'info',
      format: fileFormat,
      transports: [createConsoleTransport()],
    });
  }

  /**
   * 로거를 초기화합니다. ConfigManager에서 로그 경로와 레벨을 가져옵니다.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    const configManager = getConfigManager();
    await configManager.ensureDirectories();
    const logsDir = configManager.getLogsDir();
    const settings = configManager.getSettings();

    // 파일 로테이션 트랜스포트 설정
    const fileTransport = new DailyRotateFile({
      dirname: logsDir,
      filename: 'snapshot-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d', // 30일 보관
      format: fileFormat,
    });

    // 에러 전용 파일 트랜스포트
    const errorFileTransport = new DailyRotateFile({
      dirname: logsDir,
      filename: 'error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d',
      level: 'error',
      format: fileFormat,
    });

    this.logger = winston.createLogger({
      level: isDev ? 'debug' : settings.logLevel,
      format: fileFormat,
      transports: [fileTransport, errorFileTransport, createConsoleTransport()],
    });

    this.initialized = true;
    this.debug('로거 초기화 완료', { logsDir });
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
}

// 싱글톤 인스턴스
const logger = new Logger();

export { logger, Logger };
export default logger;
