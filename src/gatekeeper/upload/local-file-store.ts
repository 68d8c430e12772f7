import { Injectable, Logger } from '@nestjs/common';
import { mkdir, rename, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { hasErrorCode } from '../errors';
import type {
  FileStore,
  FileStoreResult,
  PendingFile,
} from './file-store.interface';

interface StagedEntry {
  stagingPath: string;
  finalPath: string;
  committed: boolean;
}

/**
 * Writes every file under a hidden `.part` name first, then renames them
 * into place. Any failure removes whatever this call wrote.
 */
@Injectable()
export class LocalFileStore implements FileStore {
  private readonly logger = new Logger(LocalFileStore.name);

  async commit(
    destination: string,
    files: readonly PendingFile[],
    signal: AbortSignal,
  ): Promise<FileStoreResult> {
    try {
      await mkdir(destination, { recursive: true });
    } catch (error) {
      return { ok: false, failure: 'DirectoryCreationFailed', cause: error };
    }

    const entries: StagedEntry[] = [];
    try {
      for (const file of files) {
        const entry: StagedEntry = {
          stagingPath: join(destination, `.${file.filename}.part`),
          finalPath: join(destination, file.filename),
          committed: false,
        };
        entries.push(entry);
        try {
          await writeFile(entry.stagingPath, file.buffer, {
            flag: 'wx',
            signal,
          });
        } catch (error) {
          // a name clash means the existing file is not ours to remove
          if (hasErrorCode(error, 'EEXIST')) {
            entries.pop();
          }
          throw error;
        }
      }

      signal.throwIfAborted();
      for (const entry of entries) {
        await rename(entry.stagingPath, entry.finalPath);
        entry.committed = true;
      }
    } catch (error) {
      await this.discard(entries);
      return { ok: false, failure: 'WriteFailed', cause: error };
    }

    return { ok: true, paths: entries.map((entry) => entry.finalPath) };
  }

  private async discard(entries: readonly StagedEntry[]): Promise<void> {
    const paths = entries.map((entry) =>
      entry.committed ? entry.finalPath : entry.stagingPath,
    );
    const results = await Promise.allSettled(
      paths.map((path) => rm(path, { force: true })),
    );
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger.error(
          `Failed to remove ${paths[index]} after an aborted upload: ${String(result.reason)}`,
        );
      }
    });
  }
}
