import path from 'node:path';
import log from 'electron-log/node';

export type LogLevelName = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

export interface LoggingOptions {
  logDir: string;
  level: LogLevelName;
}

log.transports.console.format = '[{h}:{i}:{s}.{ms}] [{level}] {text}';

if (process.env.VITEST) {
  log.transports.console.level = false;
  log.transports.file.level = false;
}

export const configureLogging = ({ logDir, level }: LoggingOptions): void => {
  log.transports.console.level = level;
  log.transports.file.level = level;
  log.transports.file.resolvePathFn = () => path.join(logDir, 'main.log');
};

export default log;
