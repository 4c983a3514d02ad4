import fs from 'fs';
import path from 'path';
import { getRuntimeConfig, LogLevel } from '../config/runtimeConfig';

export interface LogRecord {
  ts: string; // ISO timestamp
  level: LogLevel;
  evt: string; // short event key
  msg?: string;
  provider?: string;
  file?: string;
  ms?: number;
  data?: unknown;
}

const LEVEL_RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

let logFileHandle: fs.WriteStream | null = null;

function loggingCfg(){
  return getRuntimeConfig().logging;
}

// Initialize file logging if PCL_LOG_FILE is specified
function initializeFileLogging(logFile: string): void {
  if (logFileHandle) return;
  try {
    const logDir = path.dirname(logFile);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    logFileHandle = fs.createWriteStream(logFile, { flags: 'a', encoding: 'utf8' });
    logFileHandle.write(`\n=== provider-content-loader session started: ${new Date().toISOString()} ===\n`);
    process.on('exit', () => {
      if (logFileHandle && !logFileHandle.destroyed) {
        logFileHandle.write(`=== Session Ended: ${new Date().toISOString()} ===\n\n`);
        logFileHandle.end();
      }
    });
  } catch (error) {
    // Fallback to stderr only if file logging fails
    console.error(`[logger] Failed to initialize file logging to ${logFile}: ${error}`);
  }
}

export function formatLogRecord(rec: LogRecord, json: boolean): string {
  if (json) return JSON.stringify(rec);
  const parts = [rec.ts, rec.level.toUpperCase(), rec.evt, rec.msg || ''];
  if (rec.provider) parts.push(`[${rec.provider}]`);
  if (rec.file) parts.push(rec.file);
  if (rec.ms !== undefined) parts.push(`${rec.ms}ms`);
  if (rec.data !== undefined) parts.push(JSON.stringify(rec.data));
  return parts.filter(Boolean).join(' ');
}

function emit(rec: LogRecord){
  const cfg = loggingCfg();
  if (LEVEL_RANK[rec.level] > LEVEL_RANK[cfg.level]) return;
  if (!logFileHandle && cfg.file) initializeFileLogging(cfg.file);

  const logLine = formatLogRecord(rec, cfg.json);
  // stdout stays free for command output
  console.error(logLine);

  if (logFileHandle && !logFileHandle.destroyed) {
    try {
      logFileHandle.write(logLine + '\n');
      if (cfg.sync) {
        const fd = (logFileHandle as unknown as { fd?: number }).fd;
        if (typeof fd === 'number') {
          try { fs.fsyncSync(fd); } catch { /* ignore fsync errors */ }
        }
      }
    } catch { /* ignore file write failures */ }
  }
}

export function log(level: LogRecord['level'], evt: string, fields: Omit<LogRecord, 'level' | 'evt' | 'ts'> = {}){
  emit({ ts: new Date().toISOString(), level, evt, ...fields });
}

export const logDebug = (evt: string, f?: unknown) => log('debug', evt, { data: f });
export const logInfo = (evt: string, f?: unknown) => log('info', evt, { data: f });
export const logWarn = (evt: string, f?: unknown) => log('warn', evt, { data: f });
