import log from 'electron-log/node';
import { join } from 'path';

export const logFilePath = (dataDir: string) => join(dataDir, 'logs', 'agent.log');

export const configureLogging = (dataDir: string) => {
  log.transports.file.resolvePathFn = () => logFilePath(dataDir);
  log.transports.file.level = 'info';
  log.transports.console.format = '[{h}:{i}:{s}] [{level}] {text}';
  return log;
};

export { log };
