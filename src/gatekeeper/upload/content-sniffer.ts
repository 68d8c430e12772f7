import { Injectable, Logger } from '@nestjs/common';
import { fromBuffer } from 'file-type';
import { errorMessage } from '../errors';

export const OCTET_STREAM = 'application/octet-stream';
export const TEXT_PLAIN = 'text/plain';

/**
 * Classifies content from its leading bytes only. File names and
 * client-declared types are deliberately not inputs.
 */
@Injectable()
export class ContentSniffer {
  private readonly logger = new Logger(ContentSniffer.name);

  async sniff(prefix: Buffer): Promise<string> {
    if (prefix.length === 0) {
      return OCTET_STREAM;
    }

    try {
      const detected = await fromBuffer(prefix);
      if (detected) {
        return detected.mime;
      }
    } catch (error) {
      this.logger.warn(
        `Magic-byte detection failed: ${errorMessage(error)}`,
      );
      return OCTET_STREAM;
    }

    return looksLikeText(prefix) ? TEXT_PLAIN : OCTET_STREAM;
  }
}

function looksLikeText(bytes: Buffer): boolean {
  for (const byte of bytes) {
    const isControl = byte < 0x20 || byte === 0x7f;
    // tab, LF, FF, CR, ESC
    const isTextControl =
      byte === 0x09 ||
      byte === 0x0a ||
      byte === 0x0c ||
      byte === 0x0d ||
      byte === 0x1b;
    if (isControl && !isTextControl) {
      return false;
    }
  }

  try {
    // stream mode tolerates a character cut off at the end of the prefix
    new TextDecoder('utf-8', { fatal: true }).decode(bytes, { stream: true });
    return true;
  } catch {
    return false;
  }
}
