// Node.js built-in modules
import * as path from 'node:path';

// Third-party dependencies
import * as fsExtra from 'fs-extra';
import { v4 as uuidv4 } from 'uuid';

// Local imports
import { calculateFileMd5, decideTransfer, TransferDecision } from './checksum';
import { logError, logInfo, logVerbose, logWarning } from './logger';
import { TransferStatus } from './types';
import { errorMessage } from './utils';

// Types
import type { RetryingUploader } from './uploader';
import type { DestinationObject, DestinationStore, SourceObject, SourceStore, TransferOutcome } from './types';

export interface TransferContext {
  source: SourceStore;
  destination: DestinationStore;
  uploader: RetryingUploader;
  stagingRoot: string;
  onStatus?: (key: string, status: TransferStatus) => void;
}

/**
 * Map an object key to its staging file, refusing keys that escape the staging root
 */
export function resolveStagingPath(stagingRoot: string, key: string): string {
  const root = path.resolve(stagingRoot);
  const target = path.join(root, key);

  if (!target.startsWith(root + path.sep) || target === root) {
    throw new Error(`Object key '${key}' resolves outside the staging directory`);
  }
  return target;
}

async function removeStagingDir(objectDir: string): Promise<void> {
  try {
    await fsExtra.remove(objectDir);
  } catch (error) {
    logWarning(`Failed to remove temporary directory ${objectDir}: ${errorMessage(error)}`);
  }
}

/**
 * Move one object from the source container to the destination bucket.
 *
 * Directory markers are recreated as zero-byte objects without a download. Regular
 * objects are staged, hashed and compared with the destination ETag; only missing or
 * changed objects are uploaded. Every failure is returned as an outcome so sibling
 * transfers keep running. Each object is staged in a directory of its own, removed on
 * every path.
 */
export async function transferObject(object: SourceObject, context: TransferContext): Promise<TransferOutcome> {
  const { key } = object;
  const report = (status: TransferStatus): void => context.onStatus?.(key, status);

  const fail = (reason: string, error?: unknown): TransferOutcome => {
    logError(`${key}: ${reason}`, error);
    report(TransferStatus.FAILED);
    return { key, status: TransferStatus.FAILED, reason };
  };

  report(TransferStatus.PENDING);

  if (object.isDirectoryMarker) {
    try {
      await context.destination.putDirectoryMarker(key);
    } catch (error) {
      return fail(`Failed to create directory marker: ${errorMessage(error)}`, error);
    }
    logInfo(`Creating directory structure ${key} in S3.`);
    report(TransferStatus.MARKER_CREATED);
    return { key, status: TransferStatus.MARKER_CREATED };
  }

  // Keys that normalise to the same path ("a//b" and "a/b") must not share a staged file
  const objectDir = path.join(context.stagingRoot, uuidv4());
  let stagingPath: string;
  try {
    stagingPath = resolveStagingPath(objectDir, key);
  } catch (error) {
    return fail(errorMessage(error), error);
  }

  try {
    await fsExtra.ensureDir(path.dirname(stagingPath));

    report(TransferStatus.DOWNLOADING);
    try {
      await context.source.downloadObject(key, stagingPath);
    } catch (error) {
      return fail(`Failed to download from ${context.source.name}: ${errorMessage(error)}`, error);
    }

    report(TransferStatus.CHECKSUMMING);
    const localDigest = await calculateFileMd5(stagingPath);
    logVerbose(`Local MD5 of ${key}: ${localDigest}`);

    let remote: DestinationObject | undefined;
    try {
      remote = await context.destination.headObject(key);
    } catch (error) {
      return fail(`Failed to access object in ${context.destination.name}: ${errorMessage(error)}`, error);
    }

    if (decideTransfer(localDigest, remote?.etag) === TransferDecision.UP_TO_DATE) {
      logInfo(`${key} is up to date in S3. Skipping upload.`);
      report(TransferStatus.SKIPPED_UP_TO_DATE);
      return { key, status: TransferStatus.SKIPPED_UP_TO_DATE };
    }

    if (remote) {
      logInfo(`${key} exists but has changed. Overwriting ${key}...`);
    } else {
      logInfo(`${key} does not exist in S3. Uploading ${key}...`);
    }

    report(TransferStatus.UPLOADING);
    const result = await context.uploader.upload(stagingPath, key);
    if (!result.ok) {
      return fail(`Upload failed after ${result.attempts} attempt(s): ${result.error}`);
    }

    report(TransferStatus.UPLOADED);
    return { key, status: TransferStatus.UPLOADED, attempts: result.attempts };
  } catch (error) {
    return fail(errorMessage(error), error);
  } finally {
    await removeStagingDir(objectDir);
  }
}
