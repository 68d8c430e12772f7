import { join } from 'path';
import { GatekeeperConfigError } from '../errors';

export const DEFAULT_SNIFF_BYTES = 512;

const MiB = 1024 * 1024;

export interface UploadConstraintSet {
  readonly maxSizeBytes: number;
  /** Lower-case, each with its leading dot */
  readonly allowedExtensions: ReadonlySet<string>;
  /** Sniffed content types, never the client-declared one */
  readonly allowedContentTypes: ReadonlySet<string>;
  readonly fieldName: string;
  readonly required: boolean;
  readonly maxFiles: number;
  readonly destination: string;
  readonly sniffBytes: number;
}

export interface UploadConstraintInput {
  maxSizeBytes: number;
  allowedExtensions: readonly string[];
  allowedContentTypes: readonly string[];
  fieldName: string;
  required: boolean;
  maxFiles: number;
  destination: string;
  sniffBytes?: number;
}

export function defineUploadConstraints(
  input: UploadConstraintInput,
): UploadConstraintSet {
  if (!Number.isInteger(input.maxSizeBytes) || input.maxSizeBytes < 1) {
    throw new GatekeeperConfigError('maxSizeBytes must be a positive integer');
  }
  if (!Number.isInteger(input.maxFiles) || input.maxFiles < 1) {
    throw new GatekeeperConfigError('maxFiles must be a positive integer');
  }
  if (
    input.allowedExtensions.length === 0 ||
    input.allowedContentTypes.length === 0
  ) {
    throw new GatekeeperConfigError(
      `Upload field "${input.fieldName}" must allow at least one extension and content type`,
    );
  }

  return Object.freeze({
    maxSizeBytes: input.maxSizeBytes,
    allowedExtensions: new Set(
      input.allowedExtensions.map((ext) => ext.toLowerCase()),
    ),
    allowedContentTypes: new Set(input.allowedContentTypes),
    fieldName: input.fieldName,
    required: input.required,
    maxFiles: input.maxFiles,
    destination: input.destination,
    sniffBytes: input.sniffBytes ?? DEFAULT_SNIFF_BYTES,
  });
}

export function defaultUploadConstraints(
  uploadRoot: string,
): UploadConstraintSet {
  return defineUploadConstraints({
    maxSizeBytes: 10 * MiB,
    allowedExtensions: ['.jpg', '.jpeg', '.png', '.gif', '.pdf'],
    allowedContentTypes: [
      'image/jpeg',
      'image/png',
      'image/gif',
      'application/pdf',
    ],
    fieldName: 'file',
    required: true,
    maxFiles: 1,
    destination: uploadRoot,
  });
}

export function imageUploadConstraints(
  uploadRoot: string,
): UploadConstraintSet {
  return defineUploadConstraints({
    maxSizeBytes: 5 * MiB,
    allowedExtensions: ['.jpg', '.jpeg', '.png', '.gif', '.webp'],
    allowedContentTypes: ['image/jpeg', 'image/png', 'image/gif', 'image/webp'],
    fieldName: 'image',
    required: true,
    maxFiles: 1,
    destination: join(uploadRoot, 'images'),
  });
}

/**
 * Legacy .doc files sniff as a compound-file container, and a .docx whose
 * word/ entries fall outside the sniff window sniffs as a plain zip.
 */
export function documentUploadConstraints(
  uploadRoot: string,
): UploadConstraintSet {
  return defineUploadConstraints({
    maxSizeBytes: 20 * MiB,
    allowedExtensions: ['.pdf', '.doc', '.docx'],
    allowedContentTypes: [
      'application/pdf',
      'application/x-cfb',
      'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
      'application/zip',
    ],
    fieldName: 'document',
    required: true,
    maxFiles: 1,
    destination: join(uploadRoot, 'documents'),
    sniffBytes: 4100,
  });
}

export function multipleImageUploadConstraints(
  uploadRoot: string,
  maxFiles: number,
): UploadConstraintSet {
  const image = imageUploadConstraints(uploadRoot);
  return defineUploadConstraints({
    maxSizeBytes: image.maxSizeBytes,
    allowedExtensions: [...image.allowedExtensions],
    allowedContentTypes: [...image.allowedContentTypes],
    fieldName: 'images',
    required: true,
    maxFiles,
    destination: image.destination,
  });
}
