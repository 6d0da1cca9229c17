import fs from 'fs';
import { FileAccessError } from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';

const log = createLogger({ domain: 'calendar-source' });

function reasonFor(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    switch (error.code) {
      case 'ENOENT':
        return 'no such file';
      case 'EACCES':
      case 'EPERM':
        return 'permission denied';
      case 'EISDIR':
        return 'is a directory';
      default:
        return error.code;
    }
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read a calendar file as UTF-8 text.
 * The handle is opened and closed inside the call.
 */
export function readCalendarFile(path: string): string {
  try {
    const text = fs.readFileSync(path, 'utf-8');
    log.debug('calendar_file_read', { path, bytes: Buffer.byteLength(text) });
    return text;
  } catch (error) {
    throw new FileAccessError(path, reasonFor(error));
  }
}
