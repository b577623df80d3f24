/**
 * Bridge Logger
 * Logs pipeline and BLE operations to the console and to a session log file
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export type LogCategory =
  | 'BRIDGE'
  | 'CALIBRATION'
  | 'CONDITIONER'
  | 'SCHEDULER'
  | 'EMITTER'
  | 'BLE'
  | 'SENSOR'
  | 'UART';

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

const UNDER_TEST = process.env.JEST_WORKER_ID !== undefined;

function parseLevel(value: string | undefined): LogLevel {
  const upper = value?.toUpperCase();
  if (upper === 'DEBUG' || upper === 'INFO' || upper === 'WARN' || upper === 'ERROR') {
    return upper;
  }
  return UNDER_TEST ? 'ERROR' : 'INFO';
}

class BridgeLogger {
  private logFilePath: string = '';
  private logStream: fs.WriteStream | null = null;
  private readonly minLevel: LogLevel;

  constructor() {
    this.minLevel = parseLevel(process.env.TILT_BRIDGE_LOG_LEVEL);

    // No log files from test runs
    if (process.env.TILT_BRIDGE_LOG_FILE === '0' || UNDER_TEST) {
      return;
    }

    const logDir = path.join(os.tmpdir(), 'tilt-bridge-logs');

    try {
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }

      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      this.logFilePath = path.join(logDir, `bridge-${timestamp}.log`);

      this.logStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });
      this.logStream.on('error', (error) => {
        console.warn('Bridge Logger: file logging stopped -', error.message);
        this.logStream = null;
      });
      this.info(`Log file: ${this.logFilePath}`, undefined, 'BRIDGE');
    } catch (error) {
      console.warn('Bridge Logger: File logging disabled -', error instanceof Error ? error.message : String(error));
      this.logFilePath = '';
    }
  }

  private formatMessage(level: LogLevel, category: LogCategory, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    let logLine = `[${timestamp}] [${level}] [${category}] ${message}`;

    if (data !== undefined) {
      try {
        logLine += ` | ${JSON.stringify(data)}`;
      } catch {
        logLine += ' | [Unserializable data]';
      }
    }

    return logLine;
  }

  log(level: LogLevel, message: string, data?: unknown, category: LogCategory = 'BRIDGE'): void {
    const formattedMessage = this.formatMessage(level, category, message, data);

    if (LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel]) {
      if (level === 'ERROR') {
        console.error(formattedMessage);
      } else if (level === 'WARN') {
        console.warn(formattedMessage);
      } else {
        console.log(formattedMessage);
      }
    }

    // File keeps everything, including DEBUG
    if (this.logStream) {
      this.logStream.write(formattedMessage + '\n');
    }
  }

  info(message: string, data?: unknown, category: LogCategory = 'BRIDGE'): void {
    this.log('INFO', message, data, category);
  }

  warn(message: string, data?: unknown, category: LogCategory = 'BRIDGE'): void {
    this.log('WARN', message, data, category);
  }

  error(message: string, data?: unknown, category: LogCategory = 'BRIDGE'): void {
    this.log('ERROR', message, data, category);
  }

  debug(message: string, data?: unknown, category: LogCategory = 'BRIDGE'): void {
    this.log('DEBUG', message, data, category);
  }

  logConnection(deviceName: string, deviceId: string, phase: string, details?: unknown): void {
    this.info(`${phase} - ${deviceName} (${deviceId})`, details, 'BLE');
  }

  logConnectionError(deviceName: string, phase: string, error: unknown): void {
    this.error(`${phase} FAILED - ${deviceName}`, {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    }, 'BLE');
  }

  close(): void {
    if (this.logStream) {
      this.log('INFO', 'Closing bridge logger');
      this.logStream.end();
      this.logStream = null;
    }
  }

  getLogPath(): string {
    return this.logFilePath;
  }
}

// Singleton instance
export const bridgeLogger = new BridgeLogger();
