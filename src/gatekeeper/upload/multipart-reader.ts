import { Injectable } from '@nestjs/common';
import type { Request, Response } from 'express';
import multer from 'multer';
import { hasErrorCode } from '../errors';
import type { UploadConstraintSet } from './upload-constraints';

export interface UploadedPart {
  fieldName: string;
  originalName: string;
  size: number;
  buffer: Buffer;
  /** As sent by the client; informational only */
  declaredType: string;
}

export interface MultipartForm {
  parts: readonly UploadedPart[];
}

export type MultipartReadFailure = 'TooManyFiles' | 'InvalidFormData';

export type MultipartRead =
  | { ok: true; form: MultipartForm }
  | { ok: false; failure: MultipartReadFailure; message: string };

// Hard bound on file parts of any field, well above every route's maxFiles.
// The per-field count itself is checked by the upload validator.
const EXTRA_FILE_PARTS = 16;

/**
 * Keeps at most `keepBytes` of each file but counts every byte, so an
 * oversize part reaches the validator with its true size.
 */
class BoundedMemoryStorage implements multer.StorageEngine {
  constructor(private readonly keepBytes: number) {}

  _handleFile(
    _req: Request,
    file: Express.Multer.File,
    callback: (error?: unknown, info?: Partial<Express.Multer.File>) => void,
  ): void {
    const chunks: Buffer[] = [];
    let kept = 0;
    let size = 0;
    file.stream.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (kept < this.keepBytes) {
        const slice = chunk.subarray(0, this.keepBytes - kept);
        chunks.push(slice);
        kept += slice.length;
      }
    });
    file.stream.once('error', (error: Error) => callback(error));
    file.stream.once('end', () =>
      callback(null, { buffer: Buffer.concat(chunks), size }),
    );
  }

  _removeFile(
    _req: Request,
    _file: Express.Multer.File,
    callback: (error: Error | null) => void,
  ): void {
    callback(null);
  }
}

/**
 * Buffers the file parts under the route's field in memory. Parts under
 * other fields are drained unread. Non-multipart bodies yield no parts.
 */
@Injectable()
export class MultipartReader {
  read(
    req: Request,
    res: Response,
    constraints: UploadConstraintSet,
  ): Promise<MultipartRead> {
    const parse = multer({
      storage: new BoundedMemoryStorage(constraints.maxSizeBytes + 1),
      limits: { files: constraints.maxFiles + EXTRA_FILE_PARTS },
      fileFilter: (_req, file, accept) => {
        accept(null, file.fieldname === constraints.fieldName);
      },
    }).any();

    return new Promise<MultipartRead>((resolve) => {
      parse(req, res, (error?: unknown) => {
        if (error) {
          resolve(toFailure(error, constraints));
          return;
        }
        const files = Array.isArray(req.files) ? req.files : [];
        resolve({
          ok: true,
          form: {
            parts: files.map((file) => ({
              fieldName: file.fieldname,
              originalName: file.originalname,
              size: file.size,
              buffer: file.buffer,
              declaredType: file.mimetype,
            })),
          },
        });
      });
    });
  }
}

function toFailure(
  error: unknown,
  constraints: UploadConstraintSet,
): MultipartRead {
  if (hasErrorCode(error, 'LIMIT_FILE_COUNT')) {
    return {
      ok: false,
      failure: 'TooManyFiles',
      message: `Maximum ${constraints.maxFiles} files allowed`,
    };
  }
  return {
    ok: false,
    failure: 'InvalidFormData',
    message: 'Failed to parse multipart form',
  };
}
