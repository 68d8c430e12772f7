import { Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { UploadedRecords } from '../common/decorators/uploaded-records.decorator';
import { ok } from '../common/dto/api-response.dto';
import type { StoredFileRecord } from '../gatekeeper/upload/stored-file-record';

/**
 * Upload endpoints. Parsing, validation and persistence happen in the
 * gatekeeper before these handlers run; they only report the result.
 */
@Controller('files')
export class FilesController {
  @Post('upload')
  @HttpCode(HttpStatus.OK)
  upload(@UploadedRecords() files: readonly StoredFileRecord[]) {
    return uploaded(files);
  }

  @Post('upload/image')
  @HttpCode(HttpStatus.OK)
  uploadImage(@UploadedRecords() files: readonly StoredFileRecord[]) {
    return uploaded(files);
  }

  @Post('upload/document')
  @HttpCode(HttpStatus.OK)
  uploadDocument(@UploadedRecords() files: readonly StoredFileRecord[]) {
    return uploaded(files);
  }

  @Post('upload/images')
  @HttpCode(HttpStatus.OK)
  uploadImages(@UploadedRecords() files: readonly StoredFileRecord[]) {
    return uploaded(files);
  }
}

function uploaded(files: readonly StoredFileRecord[]) {
  return ok('File(s) uploaded successfully', {
    files,
    count: files.length,
  });
}
