// Local imports
import { logError } from './logger';
import { TransferStatus } from './types';
import { errorMessage } from './utils';

// Types
import type { SourceObject, TransferOutcome, TransferStats } from './types';

export type TransferTask = (object: SourceObject) => Promise<TransferOutcome>;

export interface DispatchGate {
  whenReady(): Promise<void>;
}

export interface CoordinatorOptions {
  concurrency: number;
  worker: TransferTask;
  // Dispatch waits on the gate, e.g. while credentials are being renewed
  gate?: DispatchGate;
  onOutcome?: (outcome: TransferOutcome, stats: TransferStats) => void;
}

export function createStats(total: number): TransferStats {
  return {
    total,
    uploaded: 0,
    skipped: 0,
    markersCreated: 0,
    failed: 0,
    failures: [],
    outcomes: [],
    startTime: Date.now(),
  };
}

export function recordOutcome(stats: TransferStats, outcome: TransferOutcome): void {
  stats.outcomes.push(outcome);

  switch (outcome.status) {
    case TransferStatus.UPLOADED:
      stats.uploaded++;
      break;
    case TransferStatus.SKIPPED_UP_TO_DATE:
      stats.skipped++;
      break;
    case TransferStatus.MARKER_CREATED:
      stats.markersCreated++;
      break;
    case TransferStatus.FAILED:
      stats.failed++;
      stats.failures.push({ key: outcome.key, reason: outcome.reason });
      break;
  }
}

/**
 * Run one task per object on a fixed pool of `concurrency` runners.
 *
 * Runners pull from a shared cursor, so a slow object only holds its own slot. A failed
 * object never stops the others; the promise settles once every object has an outcome.
 */
export async function runTransfers(
  objects: readonly SourceObject[],
  options: CoordinatorOptions
): Promise<TransferStats> {
  const { concurrency, worker, gate, onOutcome } = options;

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  const stats = createStats(objects.length);
  let cursor = 0;

  const runner = async (): Promise<void> => {
    while (cursor < objects.length) {
      if (gate) {
        await gate.whenReady();
      }
      // Another runner may have taken the last object while this one waited
      if (cursor >= objects.length) {
        return;
      }

      const object = objects[cursor++];
      let outcome: TransferOutcome;

      try {
        outcome = await worker(object);
      } catch (error) {
        logError(`Unexpected error transferring ${object.key}`, error);
        outcome = { key: object.key, status: TransferStatus.FAILED, reason: errorMessage(error) };
      }

      recordOutcome(stats, outcome);
      onOutcome?.(outcome, stats);
    }
  };

  const poolSize = Math.min(concurrency, objects.length);
  await Promise.all(Array.from({ length: poolSize }, () => runner()));

  stats.endTime = Date.now();
  return stats;
}
