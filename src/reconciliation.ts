// Local imports
import { listStore } from './lister';
import { logInfo, logSuccess, logWarning } from './logger';

// Types
import type { DestinationStore, SourceStore } from './types';

export enum ReconciliationStatus {
  MATCHED = 'matched',
  MISMATCHED = 'mismatched',
}

export interface ReconciliationReport {
  status: ReconciliationStatus;
  sourceCount: number;
  destinationCount: number;
}

/**
 * Count-based sanity check. Equal counts do not prove equal content.
 */
export function compareCounts(sourceCount: number, destinationCount: number): ReconciliationReport {
  return {
    status: sourceCount === destinationCount ? ReconciliationStatus.MATCHED : ReconciliationStatus.MISMATCHED,
    sourceCount,
    destinationCount,
  };
}

/**
 * Re-list both stores and compare their object counts
 */
export async function reconcile(source: SourceStore, destination: DestinationStore): Promise<ReconciliationReport> {
  const [sourceObjects, destinationObjects] = await Promise.all([
    listStore(source),
    listStore(destination),
  ]);

  const report = compareCounts(sourceObjects.length, destinationObjects.length);

  logInfo(`Total objects in ${source.name}: ${report.sourceCount}`);
  logInfo(`Total objects in ${destination.name}: ${report.destinationCount}`);

  if (report.status === ReconciliationStatus.MATCHED) {
    logSuccess('Object count matches between Swift container and S3 bucket.');
  } else {
    logWarning('Object count mismatch between Swift container and S3 bucket.');
  }

  return report;
}
