import fs from 'fs';
import path from 'path';
import { getRuntimeConfig, LogLevel } from '../config/runtimeConfig';

export interface LogRecord {
  ts: string; // ISO timestamp
  level: LogLevel;
  evt: string; // short event key
  msg?: string;
  data?: unknown;
}

const LEVEL_RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

let logFd: number | null = null;
let logFilePath: string | undefined;

function loggingCfg(){
  return getRuntimeConfig().logging;
}

// Lazily open the file sink on first emit when RGW_BUNDLE_LOG_FILE is set.
// Writes are synchronous so an interrupted run still leaves every line it emitted on disk.
function initializeFileLogging(logFile: string): void {
  if (logFd !== null && logFilePath === logFile) return;
  closeFileLogging();

  try {
    const logDir = path.dirname(logFile);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    logFd = fs.openSync(logFile, 'a');
    logFilePath = logFile;
    fs.writeSync(logFd, `\n=== rgw-support-bundle run started: ${new Date().toISOString()} pid=${process.pid} ===\n`);
  } catch (error) {
    logFd = null;
    logFilePath = undefined;
    process.stderr.write(`[logger] Failed to initialize file logging to ${logFile}: ${error}\n`);
  }
}

export function closeFileLogging(): void {
  if (logFd !== null) {
    try { fs.closeSync(logFd); } catch { /* already closed */ }
  }
  logFd = null;
  logFilePath = undefined;
}

export function formatRecord(rec: LogRecord, json: boolean): string {
  if(json) return JSON.stringify(rec);
  const parts = [rec.ts, rec.level.toUpperCase(), rec.evt, rec.msg||''];
  if(rec.data !== undefined) parts.push(JSON.stringify(rec.data));
  return parts.filter(Boolean).join(' ');
}

function emit(rec: LogRecord){
  const cfg = loggingCfg();
  if(LEVEL_RANK[rec.level] > LEVEL_RANK[cfg.level]) return;
  if (cfg.file) initializeFileLogging(cfg.file);

  const logLine = formatRecord(rec, cfg.json);

  // stdout carries only the archive path
  process.stderr.write(logLine + '\n');

  if (logFd !== null) {
    try {
      fs.writeSync(logFd, logLine + '\n');
      if(cfg.sync) fs.fsyncSync(logFd);
    } catch { /* file sink is best effort; stderr already has the line */ }
  }
}

export function log(level: LogLevel, evt: string, fields: Omit<LogRecord,'level'|'evt'|'ts'> = {}){
  emit({ ts: new Date().toISOString(), level, evt, ...fields });
}

export const logDebug = (evt:string, f?:unknown)=> log('debug', evt, { data:f });
export const logInfo = (evt:string, f?:unknown)=> log('info', evt, { data:f });
export const logWarn = (evt:string, f?:unknown)=> log('warn', evt, { data:f });
export const logError = (evt:string, f?:unknown)=> log('error', evt, { data:f });
