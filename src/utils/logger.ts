export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

type LevelName = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const levelsByName: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  none: LogLevel.NONE,
};

export function parseLogLevel(name: string): LogLevel {
  return levelsByName[name.toLowerCase()] ?? LogLevel.INFO;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

// 2014-05-02 10:31:07,412
function formatTimestamp(now: Date): string {
  const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;
  return `${date} ${time},${pad(now.getMilliseconds(), 3)}`;
}

class Logger {
  private level: LogLevel = LogLevel.INFO;

  setLevel(level: LogLevel) {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  debug(message: string) {
    this.write(LogLevel.DEBUG, 'DEBUG', message);
  }

  info(message: string) {
    this.write(LogLevel.INFO, 'INFO', message);
  }

  warn(message: string) {
    this.write(LogLevel.WARN, 'WARN', message);
  }

  error(message: string, error?: unknown) {
    const detail = error instanceof Error && error.stack ? `\n${error.stack}` : '';
    this.write(LogLevel.ERROR, 'ERROR', `${message}${detail}`);
  }

  private write(level: LogLevel, name: LevelName, message: string) {
    if (level < this.level) {
      return;
    }
    const line = `${formatTimestamp(new Date())}: ${name}: ${message}`;
    if (level === LogLevel.DEBUG) console.debug(line);
    else if (level === LogLevel.INFO) console.info(line);
    else if (level === LogLevel.WARN) console.warn(line);
    else console.error(line);
  }
}

export const logger = new Logger();
