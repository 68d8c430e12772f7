import { Inject, Injectable, Logger } from '@nestjs/common';
import { sep } from 'path';
import { errorMessage } from '../errors';
import { CLOCK, FILE_STORE } from '../gatekeeper.constants';
import type { Clock } from '../clock';
import { ContentSniffer } from './content-sniffer';
import type { FileStore, PendingFile } from './file-store.interface';
import type { MultipartForm, UploadedPart } from './multipart-reader';
import type { StoredFileRecord } from './stored-file-record';
import type { UploadConstraintSet } from './upload-constraints';
import { fileExtension, UniqueFilenameGenerator } from './unique-filename';

export type UploadFailure =
  | 'FileRequired'
  | 'TooManyFiles'
  | 'FileTooLarge'
  | 'DisallowedExtension'
  | 'DisallowedContentType'
  | 'StorageFailure'
  | 'InternalFailure';

export type UploadOutcome =
  | { ok: true; files: StoredFileRecord[] }
  | { ok: false; failure: UploadFailure; message: string };

type PartCheck =
  | { ok: true; contentType: string }
  | { ok: false; failure: UploadFailure; message: string };

@Injectable()
export class UploadValidator {
  private readonly logger = new Logger(UploadValidator.name);
  private readonly filenames: UniqueFilenameGenerator;

  constructor(
    private readonly contentSniffer: ContentSniffer,
    @Inject(FILE_STORE) private readonly fileStore: FileStore,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.filenames = new UniqueFilenameGenerator(clock);
  }

  /**
   * Validates every part under the configured field, then persists them.
   * Nothing is written unless all parts pass all checks.
   */
  async process(
    form: MultipartForm,
    constraints: UploadConstraintSet,
    signal: AbortSignal,
  ): Promise<UploadOutcome> {
    const parts = form.parts.filter(
      (part) => part.fieldName === constraints.fieldName,
    );

    if (constraints.required && parts.length === 0) {
      return {
        ok: false,
        failure: 'FileRequired',
        message: `File field '${constraints.fieldName}' is required`,
      };
    }
    if (parts.length > constraints.maxFiles) {
      return {
        ok: false,
        failure: 'TooManyFiles',
        message: `Maximum ${constraints.maxFiles} files allowed`,
      };
    }

    const accepted: { part: UploadedPart; contentType: string }[] = [];
    for (const part of parts) {
      const check = await this.checkPart(part, constraints);
      if (!check.ok) {
        return check;
      }
      accepted.push({ part, contentType: check.contentType });
    }

    if (accepted.length === 0) {
      return { ok: true, files: [] };
    }

    const pending: PendingFile[] = accepted.map(({ part }) => ({
      filename: this.filenames.generate(part.originalName),
      buffer: part.buffer,
    }));

    const stored = await this.fileStore.commit(
      constraints.destination,
      pending,
      signal,
    );
    if (!stored.ok) {
      this.logger.error(
        `Upload to ${constraints.destination} failed (${stored.failure}): ${errorMessage(stored.cause)}`,
      );
      return stored.failure === 'DirectoryCreationFailed'
        ? {
            ok: false,
            failure: 'InternalFailure',
            message: 'Failed to create upload directory',
          }
        : { ok: false, failure: 'StorageFailure', message: 'Failed to save file' };
    }

    const uploadedAt = new Date(this.clock.now());
    return {
      ok: true,
      files: accepted.map(({ part, contentType }, index) =>
        Object.freeze({
          originalName: part.originalName,
          filename: pending[index].filename,
          size: part.size,
          path: stored.paths[index].split(sep).join('/'),
          uploadedAt,
          contentType,
        }),
      ),
    };
  }

  private async checkPart(
    part: UploadedPart,
    constraints: UploadConstraintSet,
  ): Promise<PartCheck> {
    if (part.size > constraints.maxSizeBytes) {
      return {
        ok: false,
        failure: 'FileTooLarge',
        message: `File size exceeds maximum allowed size of ${constraints.maxSizeBytes} bytes`,
      };
    }

    const ext = fileExtension(part.originalName).toLowerCase();
    if (!constraints.allowedExtensions.has(ext)) {
      return {
        ok: false,
        failure: 'DisallowedExtension',
        message: `File extension '${ext}' not allowed. Allowed extensions: ${[...constraints.allowedExtensions].join(', ')}`,
      };
    }

    const contentType = await this.contentSniffer.sniff(
      part.buffer.subarray(0, constraints.sniffBytes),
    );
    if (!constraints.allowedContentTypes.has(contentType)) {
      return {
        ok: false,
        failure: 'DisallowedContentType',
        message: `File type '${contentType}' not allowed. Allowed types: ${[...constraints.allowedContentTypes].join(', ')}`,
      };
    }

    return { ok: true, contentType };
  }
}
