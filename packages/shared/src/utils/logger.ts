import { formatDate, formatTimeWithSeconds } from './date';

// 로그 레벨
export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug: (message: string) => void;
}

// UTC 타임스탬프를 붙여서 통일된 형식으로 출력
export function formatLog(level: LogLevel, source: string, message: string, now = new Date()): string {
  const timestamp = `${formatDate(now)} ${formatTimeWithSeconds(now)}`;
  return `[${timestamp}] [${level.toUpperCase()}] [${source}] ${message}`;
}

// 로거 생성 함수 — 각 모듈에서 source 이름을 지정하여 사용
export function createLogger(source: string): Logger {
  return {
    info: (message: string) => {
      console.log(formatLog('info', source, message));
    },
    warn: (message: string) => {
      console.warn(formatLog('warn', source, message));
    },
    error: (message: string) => {
      console.error(formatLog('error', source, message));
    },
    debug: (message: string) => {
      if (process.env.NODE_ENV !== 'production') {
        console.debug(formatLog('debug', source, message));
      }
    },
  };
}

// 테스트 등에서 출력 없이 주입할 때 사용
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
