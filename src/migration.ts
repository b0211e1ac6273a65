// Node.js built-in modules
import * as os from 'node:os';
import * as path from 'node:path';

// Third-party dependencies
import chalk from 'chalk';
import * as fsExtra from 'fs-extra';
import ora from 'ora';
import { v4 as uuidv4 } from 'uuid';

// Local imports
import { readAwsCredentials } from './config';
import { runTransfers } from './coordinator';
import { CredentialGate, promptForCredentials } from './credentials';
import { listStore } from './lister';
import {
  log,
  LogLevel,
  logError,
  logInfo,
  logSuccess,
  logVerbose,
  logWarning,
} from './logger';
import { TransferProgress } from './progress';
import { reconcile, ReconciliationStatus } from './reconciliation';
import { S3DestinationStore } from './s3-client';
import { authenticateSwift, SwiftSourceStore } from './swift-client';
import { BandwidthLimiter } from './throttle';
import { transferObject } from './transfer-worker';
import { RetryingUploader } from './uploader';
import { errorMessage, formatBytes, formatTime } from './utils';

// Types
import type { CredentialPrompt } from './credentials';
import type { ProgressBar } from './progress';
import type { ReconciliationReport } from './reconciliation';
import type { FetchLike } from './swift-client';
import type {
  DestinationStore,
  SourceObject,
  SourceStore,
  TransferConfig,
  TransferStats,
} from './types';

export interface TransferServices {
  source: SourceStore;
  destination: DestinationStore;
  gate: CredentialGate;
  progress: TransferProgress;
}

export interface TransferReport {
  stats: TransferStats | null;
  reconciliation: ReconciliationReport | null;
  stagingRoot: string;
}

export interface RunOptions {
  sleep?: (ms: number) => Promise<void>;
}

export interface ServiceOptions {
  env?: NodeJS.ProcessEnv;
  prompt?: CredentialPrompt;
  fetch?: FetchLike;
  createProgressBar?: () => ProgressBar;
}

/**
 * Authenticate against Swift and build both stores around one credential gate and one
 * bandwidth limiter. The credential prompt pauses the progress bar while it is open.
 */
export async function createTransferServices(
  config: TransferConfig,
  options: ServiceOptions = {}
): Promise<TransferServices> {
  const progress = new TransferProgress(options.createProgressBar);
  const prompt = options.prompt ?? promptForCredentials;
  const gate = new CredentialGate(
    readAwsCredentials(options.env ?? process.env),
    () => progress.pauseFor(prompt)
  );
  const session = await authenticateSwift(config.swift ?? {}, options.fetch);

  const source = new SwiftSourceStore({
    session,
    container: config.container,
    prefix: config.prefix,
    pageSize: config.listPageSize,
    requestTimeoutMs: config.requestTimeoutMs,
    fetch: options.fetch,
  });

  const destination = new S3DestinationStore({
    bucket: config.bucket,
    region: config.region,
    gate,
    prefix: config.prefix,
    limiter: BandwidthLimiter.fromMegabytes(config.bandwidthLimitMb),
    requestTimeoutMs: config.requestTimeoutMs,
    listPageSize: config.listPageSize,
  });

  return { source, destination, gate, progress };
}

/**
 * List the source and push every object through the worker pool
 */
async function transferAll(
  config: TransferConfig,
  services: TransferServices,
  stagingRoot: string,
  options: RunOptions
): Promise<TransferStats | null> {
  const { source, destination, gate, progress } = services;

  const spinner = ora(`Listing objects in ${source.name}...`).start();
  let objects: SourceObject[];

  try {
    objects = await listStore(source);
  } catch (error) {
    spinner.fail(`Failed to list objects: ${errorMessage(error)}`);
    logError(`Failed to list objects in ${source.name}`, error);
    throw error;
  }

  spinner.succeed(`Found ${chalk.bold(objects.length.toString())} objects in ${source.name}`);
  log(LogLevel.SUCCESS, `Found ${objects.length} objects in ${source.name}`, true);

  if (objects.length === 0) {
    logWarning('No objects found in Swift container.');
    return null;
  }

  const uploader = new RetryingUploader(destination, gate, {
    maxAttempts: config.maxAttempts,
    baseDelayMs: config.retryBaseDelayMs,
    maxDelayMs: config.retryMaxDelayMs,
    maxTotalMs: config.maxObjectTransferMs,
    sleep: options.sleep,
  });

  logInfo(`Starting transfer with ${config.maxWorkers} workers`, chalk.cyan);
  progress.start(objects.length);

  try {
    return await runTransfers(objects, {
      concurrency: config.maxWorkers,
      gate,
      worker: (object) => transferObject(object, { source, destination, uploader, stagingRoot }),
      onOutcome: (outcome) => progress.increment(outcome.key),
    });
  } finally {
    progress.stop();
  }
}

/**
 * Print final summary
 */
function printSummary(stats: TransferStats, reconciliation: ReconciliationReport): void {
  const elapsedTime = Math.floor(((stats.endTime || Date.now()) - stats.startTime) / 1000);

  logInfo('Transfer Summary', chalk.cyanBright.bold);
  logInfo('─'.repeat(50), chalk.white);
  logInfo(`Total objects:      ${stats.total}`, chalk.white);
  logInfo(`Uploaded:           ${stats.uploaded}`, chalk.green);
  logInfo(`Up to date:         ${stats.skipped}`, chalk.gray);
  logInfo(`Directory markers:  ${stats.markersCreated}`, chalk.gray);
  logInfo(`Failed:             ${stats.failed}`, chalk.redBright);
  logInfo(`Object counts:      ${reconciliation.sourceCount} source / ${reconciliation.destinationCount} target (${reconciliation.status})`, chalk.white);
  logInfo(`Total time:         ${formatTime(elapsedTime)}`, chalk.white);

  if (stats.failures.length > 0) {
    logInfo('', chalk.white);
    logWarning('Failed objects:');

    for (const failure of stats.failures) {
      logError(`  ✗ ${failure.key} (${failure.reason})`);
    }
  }

  logInfo('', chalk.white);

  if (stats.failed === 0 && reconciliation.status === ReconciliationStatus.MATCHED) {
    logSuccess('✓ Transfer completed successfully!');
  } else if (stats.failed < stats.total) {
    logWarning('⚠ Transfer completed with some issues.');
  } else {
    logError('✗ Transfer failed for every object!');
  }
}

/**
 * Run a full transfer: bucket check, listing, worker pool, staging cleanup and the
 * final count reconciliation. Per-object failures are reported, not thrown.
 */
export async function runTransfer(
  config: TransferConfig,
  services: TransferServices,
  options: RunOptions = {}
): Promise<TransferReport> {
  const { source, destination } = services;

  logInfo('Starting OpenStack to S3 transfer...', chalk.cyanBright);
  logInfo(`Source: ${source.name}`, chalk.cyan);
  logInfo(`Target: ${destination.name}`, chalk.cyan);
  logInfo(`Workers: ${config.maxWorkers}`, chalk.white);
  logInfo(`Bandwidth limit: ${formatBytes(config.bandwidthLimitMb * 1024 * 1024)}/s`, chalk.white);
  logInfo(`Max upload attempts: ${config.maxAttempts}`, chalk.white);

  if (config.prefix) {
    logInfo(`Prefix: ${config.prefix}`, chalk.cyan);
  }

  await destination.ensureBucket();

  const stagingRoot = path.join(config.stagingDir ?? os.tmpdir(), `${config.bucket}-${uuidv4()}`);
  await fsExtra.ensureDir(stagingRoot);
  logVerbose(`Staging directory: ${stagingRoot}`);

  let stats: TransferStats | null;
  try {
    stats = await transferAll(config, services, stagingRoot, options);
  } finally {
    await fsExtra.remove(stagingRoot);
    logVerbose('Temporary files have been removed');
  }

  if (!stats) {
    return { stats, reconciliation: null, stagingRoot };
  }

  const reconciliation = await reconcile(source, destination);
  printSummary(stats, reconciliation);
  logInfo('OpenStack to S3 transfer process completed.', chalk.cyanBright);

  return { stats, reconciliation, stagingRoot };
}
