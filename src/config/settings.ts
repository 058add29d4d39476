/**
 * Process-wide settings, read once from the environment.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function positiveInt(raw: string | undefined, fallback: number): number {
  const value = parseInt(raw || String(fallback), 10);
  return Number.isNaN(value) || value <= 0 ? fallback : value;
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = 'warn'): LogLevel {
  const normalized = (raw || '').trim().toLowerCase();
  return LOG_LEVELS.find(level => level === normalized) ?? fallback;
}

// Bytes pulled from a file per read while iterating lines
export const READ_CHUNK_SIZE = positiveInt(process.env.CSV_READ_CHUNK_SIZE, 64 * 1024);

// Encoded lines are buffered up to this many bytes before hitting the file
export const WRITE_BUFFER_SIZE = positiveInt(process.env.CSV_WRITE_BUFFER_SIZE, 1024 * 1024);

export const LOG_LEVEL = parseLogLevel(process.env.CSV_MAPPER_LOG_LEVEL);
