import { basename } from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { Clock } from '../clock';

const UNSAFE_CHARACTERS = /[^a-zA-Z0-9._-]/g;

/**
 * Strips directories and replaces anything outside [A-Za-z0-9._-]
 */
export function sanitizeFileName(fileName: string): string {
  const baseName = basename(fileName.replace(/\\/g, '/'));
  return baseName.replace(UNSAFE_CHARACTERS, '_');
}

/**
 * Everything from the last dot of the base name, so `.jpg` is its own
 * extension. Empty when there is no dot.
 */
export function fileExtension(fileName: string): string {
  const safeName = sanitizeFileName(fileName);
  const dot = safeName.lastIndexOf('.');
  return dot === -1 ? '' : safeName.slice(dot);
}

/**
 * `<base>_<timestamp ms>_<uuid v4><ext>`. Timestamps never go backwards
 * within one generator even if the clock does.
 */
export class UniqueFilenameGenerator {
  private lastTimestamp = 0;

  constructor(private readonly clock: Clock) {}

  generate(originalName: string): string {
    const safeName = sanitizeFileName(originalName);
    const ext = fileExtension(safeName);
    const base = safeName.slice(0, safeName.length - ext.length) || 'upload';

    this.lastTimestamp = Math.max(this.lastTimestamp, this.clock.now());
    return `${base}_${this.lastTimestamp}_${uuidv4()}${ext}`;
  }
}
