import pino from 'pino';
import type { FabdexLogger } from '../../src/logging/logger.js';

/**
 * Logger that drops everything
 */
export function silentLogger(): FabdexLogger {
  return pino({ level: 'silent' });
}

/**
 * Logger that keeps every JSON record in memory
 */
export function recordingLogger(level: 'debug' | 'info' | 'warn' = 'debug'): {
  logger: FabdexLogger;
  records: Array<Record<string, unknown>>;
} {
  const records: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level },
    {
      write(line: string): void {
        const parsed: unknown = JSON.parse(line);
        if (typeof parsed === 'object' && parsed !== null) {
          records.push(Object.fromEntries(Object.entries(parsed)));
        }
      },
    }
  );
  return { logger, records };
}
