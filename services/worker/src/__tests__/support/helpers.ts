import pino from 'pino';
import { buffer } from 'stream/consumers';
import { ZipFile } from 'yazl';
import type { Logger } from '../../lib/logger.js';

export interface LogLine {
  level: number;
  msg: string;
  [field: string]: unknown;
}

/**
 * pino logger writing JSON lines into memory
 */
export function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const destination = {
    write(message: string) {
      lines.push(JSON.parse(message));
    },
  };
  return { logger: pino({ level: 'debug' }, destination), lines };
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

type ZipContent = string | Uint8Array;

/**
 * Entries are stored in the order given; pass an array of pairs when the
 * order matters, since object keys that look like integers sort first.
 */
export async function buildZip(
  entries: Record<string, ZipContent> | [string, ZipContent][],
  directories: string[] = []
): Promise<Buffer> {
  const zip = new ZipFile();
  for (const directory of directories) {
    zip.addEmptyDirectory(directory);
  }
  for (const [path, content] of Array.isArray(entries) ? entries : Object.entries(entries)) {
    zip.addBuffer(Buffer.from(content), path);
  }
  zip.end();
  return buffer(zip.outputStream);
}

export function recordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}
