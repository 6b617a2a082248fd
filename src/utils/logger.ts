import { pino, type Logger, type LevelWithSilent, destination, multistream, type DestinationStream } from 'pino';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

const LOG_LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function resolveLogLevel(value: string | undefined): LevelWithSilent {
  return LOG_LEVELS.find(level => level === value) ?? 'info';
}

const logLevel = resolveLogLevel(process.env['LOG_LEVEL']);

const defaultLogDir = path.join(os.homedir(), '.meshwatch', 'logs');
const logDir = process.env['MESHWATCH_LOG_DIR'] ?? defaultLogDir;
const logToFile = process.env['MESHWATCH_LOG_FILE'] === 'true';

let fileLoggingActive = false;
let resolvedLogPath = '';

function getLogFilePath(): string {
  const date = new Date().toISOString().split('T')[0];
  return path.join(logDir, `meshwatch-${date}.log`);
}

const streams: Array<{ stream: DestinationStream }> = [
  { stream: process.stdout },
];

if (logToFile) {
  try {
    fs.mkdirSync(logDir, { recursive: true });
    resolvedLogPath = getLogFilePath();
    streams.push({
      stream: destination({ dest: resolvedLogPath, sync: false, mkdir: true }),
    });
    fileLoggingActive = true;
  } catch (err) {
    // stdout only
    process.stderr.write(`meshwatch: file logging disabled (${err instanceof Error ? err.message : String(err)})\n`);
  }
}

export const logger = pino(
  {
    level: logLevel,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
  },
  multistream(streams)
);

logger.debug({
  logFile: fileLoggingActive ? resolvedLogPath : 'stdout only',
  logDir,
  pid: process.pid,
}, 'Logger initialized');

export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}

/**
 * Get the current log file path, or null when logging to stdout only.
 */
export function getCurrentLogFile(): string | null {
  return fileLoggingActive ? resolvedLogPath : null;
}
