export interface PendingFile {
  filename: string;
  buffer: Buffer;
}

export type FileStoreFailure = 'DirectoryCreationFailed' | 'WriteFailed';

export type FileStoreResult =
  | { ok: true; paths: string[] }
  | { ok: false; failure: FileStoreFailure; cause: unknown };

/**
 * Persists a request's accepted files as one unit: either every file is
 * committed or none is left behind.
 */
export interface FileStore {
  commit(
    destination: string,
    files: readonly PendingFile[],
    signal: AbortSignal,
  ): Promise<FileStoreResult>;
}
