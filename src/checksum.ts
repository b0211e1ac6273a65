// Node.js built-in modules
import * as crypto from 'node:crypto';
import * as fs from 'node:fs';

export const CHECKSUM_CHUNK_SIZE = 4096;

export enum TransferDecision {
  UP_TO_DATE = 'up_to_date',
  NEEDS_UPLOAD = 'needs_upload',
}

/**
 * Calculate the MD5 digest of a local file, reading it in fixed-size chunks
 */
export function calculateFileMd5(filePath: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const hash = crypto.createHash('md5');
    const fileStream = fs.createReadStream(filePath, { highWaterMark: CHECKSUM_CHUNK_SIZE });

    fileStream.on('error', (error) => {
      reject(error);
    });

    fileStream.on('data', (chunk) => {
      hash.update(chunk);
    });

    fileStream.on('end', () => {
      resolve(hash.digest('hex'));
    });
  });
}

/**
 * S3 reports ETags wrapped in double quotes
 */
export function normalizeEtag(etag: string): string {
  return etag.replace(/^"+|"+$/g, '');
}

/**
 * Decide whether a staged object has to be uploaded.
 * Multipart ETags ("<hex>-<parts>") never equal a plain MD5, so those objects are re-uploaded.
 */
export function decideTransfer(localDigest: string, remoteDigest: string | undefined): TransferDecision {
  if (remoteDigest === undefined) {
    return TransferDecision.NEEDS_UPLOAD;
  }

  return normalizeEtag(remoteDigest).toLowerCase() === localDigest.toLowerCase()
    ? TransferDecision.UP_TO_DATE
    : TransferDecision.NEEDS_UPLOAD;
}
