import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';
import type { LogLevel } from '../types/logger.js';
import { getTraceContext } from './trace-context.js';

export interface LoggerConfig {
  level: LogLevel;
  /** pino-pretty on stdout instead of JSON lines */
  pretty: boolean;
  /** Also write a per-run file under logDir */
  toFile: boolean;
  logDir: string;
  /** Run files kept in logDir, newest first */
  maxFiles: number;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  pretty: process.env['NODE_ENV'] !== 'production',
  toFile: true,
  logDir: './data/logs',
  maxFiles: 10,
};

const LOG_FILE_PATTERN = /^raidbell-.*\.log$/;

/**
 * Name of the log file for a run started at `startedAt`.
 */
export function generateLogFilename(startedAt: Date = new Date()): string {
  return `raidbell-${startedAt.toISOString().replace(/[:.]/g, '-')}.log`;
}

/**
 * Delete empty run files and all but the `maxFiles` most recent ones.
 * Files not named like a run file are left alone.
 */
export function cleanupOldLogs(logDir: string, maxFiles: number): void {
  let names: string[];
  try {
    names = fs.readdirSync(logDir).filter((name) => LOG_FILE_PATTERN.test(name));
  } catch {
    return;
  }

  const runs = names
    .map((name) => {
      const file = path.join(logDir, name);
      const { mtimeMs, size } = fs.statSync(file);
      return { file, mtimeMs, size };
    })
    .sort((a, b) => b.mtimeMs - a.mtimeMs);

  let kept = 0;
  for (const run of runs) {
    if (run.size > 0 && kept < maxFiles) {
      kept++;
      continue;
    }
    fs.rmSync(run.file, { force: true });
  }
}

/**
 * Adds traceId/spanId/parentId/correlationId of the current tick or command
 * to every line.
 */
function traceMixin(): Record<string, string> {
  const ctx = getTraceContext();
  if (!ctx) return {};

  const fields: Record<string, string> = {};
  for (const [key, value] of Object.entries(ctx)) {
    if (typeof value === 'string' && value.length > 0) {
      fields[key] = value;
    }
  }
  return fields;
}

/**
 * Root application logger: stdout (pretty or JSON) plus an optional
 * plain-text file per run.
 */
export function createLogger(overrides: Partial<LoggerConfig> = {}): pino.Logger {
  const config = { ...DEFAULT_CONFIG, ...overrides };

  const targets: pino.TransportTargetOptions[] = [
    config.pretty
      ? { target: 'pino-pretty', level: config.level, options: { colorize: true } }
      : { target: 'pino/file', level: config.level, options: { destination: 1 } },
  ];

  if (config.toFile) {
    fs.mkdirSync(config.logDir, { recursive: true });
    cleanupOldLogs(config.logDir, config.maxFiles);
    targets.push({
      target: 'pino-pretty',
      level: config.level,
      options: {
        destination: path.join(config.logDir, generateLogFilename()),
        colorize: false,
      },
    });
  }

  return pino({ level: config.level, transport: { targets }, mixin: traceMixin });
}
