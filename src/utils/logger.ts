export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR"
}

const icons: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "🔍",
  [LogLevel.INFO]: "ℹ️",
  [LogLevel.WARN]: "⚠️",
  [LogLevel.ERROR]: "❌"
};

function debugEnabled(): boolean {
  return (process.env.LOG_LEVEL ?? "").toLowerCase() === "debug";
}

/**
 * Writes a timestamped, level-tagged line to the console.
 * DEBUG lines are only printed when LOG_LEVEL=debug.
 * @param level Severity of the message
 * @param scope Short component tag, e.g. 'ProxyPool'
 * @param message The text to print
 */
export function log(level: LogLevel, scope: string, message: string): void {
  if (level === LogLevel.DEBUG && !debugEnabled()) return;

  const line = `[${new Date().toLocaleTimeString()}] ${icons[level]} [${scope}] ${message}`;

  if (level === LogLevel.ERROR) {
    console.error(line);
  } else if (level === LogLevel.WARN) {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
