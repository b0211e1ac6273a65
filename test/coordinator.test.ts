import * as fs from 'node:fs';

import { afterEach, describe, expect, it } from 'vitest';

import { runTransfers } from '../src/coordinator';
import { CredentialGate } from '../src/credentials';
import { listStore } from '../src/lister';
import { transferObject } from '../src/transfer-worker';
import { TransferStatus } from '../src/types';
import { RetryingUploader } from '../src/uploader';
import { sleep } from '../src/utils';
import { InMemoryDestinationStore, InMemorySourceStore, listFiles, makeTempDir } from './helpers/memory-stores';

import type { SourceObject, TransferOutcome } from '../src/types';

function objects(...keys: string[]): SourceObject[] {
  return keys.map(key => ({ key, size: 1, isDirectoryMarker: key.endsWith('/') }));
}

describe('runTransfers', () => {
  const stagingRoots: string[] = [];

  afterEach(() => {
    for (const root of stagingRoots.splice(0)) {
      fs.rmSync(root, { recursive: true, force: true });
    }
  });

  it('never runs more workers than the concurrency limit', async () => {
    let active = 0;
    let peak = 0;

    const stats = await runTransfers(objects('a', 'b', 'c', 'd', 'e'), {
      concurrency: 2,
      worker: async (object) => {
        active++;
        peak = Math.max(peak, active);
        await sleep(5);
        active--;
        return { key: object.key, status: TransferStatus.UPLOADED, attempts: 1 };
      },
    });

    expect(peak).toBe(2);
    expect(stats.uploaded).toBe(5);
    expect(stats.endTime).toBeGreaterThanOrEqual(stats.startTime);
  });

  it('keeps going after a failed object and tallies every outcome', async () => {
    const seen: string[] = [];

    const stats = await runTransfers(objects('a', 'b', 'dir/', 'c', 'd'), {
      concurrency: 3,
      worker: async (object): Promise<TransferOutcome> => {
        if (object.key === 'b') {
          throw new Error('worker crashed');
        }
        if (object.key === 'c') {
          return { key: 'c', status: TransferStatus.FAILED, reason: 'Upload failed after 3 attempt(s): timeout' };
        }
        if (object.key === 'd') {
          return { key: 'd', status: TransferStatus.SKIPPED_UP_TO_DATE };
        }
        if (object.isDirectoryMarker) {
          return { key: object.key, status: TransferStatus.MARKER_CREATED };
        }
        return { key: object.key, status: TransferStatus.UPLOADED, attempts: 1 };
      },
      onOutcome: (outcome) => seen.push(outcome.key),
    });

    expect(stats).toMatchObject({ total: 5, uploaded: 1, skipped: 1, markersCreated: 1, failed: 2 });
    expect(stats.failures).toHaveLength(2);
    expect(stats.failures).toEqual(expect.arrayContaining([
      { key: 'b', reason: 'worker crashed' },
      { key: 'c', reason: 'Upload failed after 3 attempt(s): timeout' },
    ]));
    expect([...seen].sort()).toEqual(['a', 'b', 'c', 'd', 'dir/']);
    expect(stats.outcomes).toHaveLength(5);
  });

  it('holds dispatch until the gate opens', async () => {
    let open: () => void = () => undefined;
    const gateOpen = new Promise<void>((resolve) => {
      open = resolve;
    });
    const started: string[] = [];

    const run = runTransfers(objects('a', 'b'), {
      concurrency: 2,
      gate: { whenReady: () => gateOpen },
      worker: async (object) => {
        started.push(object.key);
        return { key: object.key, status: TransferStatus.UPLOADED, attempts: 1 };
      },
    });

    await sleep(5);
    expect(started).toEqual([]);

    open();
    const stats = await run;
    expect(started).toEqual(['a', 'b']);
    expect(stats.uploaded).toBe(2);
  });

  it('returns empty stats for an empty listing', async () => {
    const stats = await runTransfers([], {
      concurrency: 4,
      worker: async () => {
        throw new Error('should not run');
      },
    });

    expect(stats).toMatchObject({ total: 0, uploaded: 0, failed: 0, outcomes: [] });
  });

  it('rejects a concurrency below one', async () => {
    await expect(runTransfers(objects('a'), {
      concurrency: 0,
      worker: async (object) => ({ key: object.key, status: TransferStatus.SKIPPED_UP_TO_DATE }),
    })).rejects.toThrow('Concurrency must be a positive integer, got 0');
  });

  it('leaves no staged files behind, whatever the outcome', async () => {
    const stagingRoot = makeTempDir();
    stagingRoots.push(stagingRoot);

    const source = new InMemorySourceStore({
      'ok.txt': 'fine',
      'same.txt': 'same',
      'broken.txt': 'never read',
      'rejected.txt': 'refused',
      'folder/': '',
      'folder/inner.txt': 'inner',
    });
    source.failingDownloads.add('broken.txt');

    const destination = new InMemoryDestinationStore({ 'same.txt': 'same' });
    destination.uploadFailure = (key) => (key === 'rejected.txt' ? new Error('403 AccessDenied') : undefined);

    const gate = new CredentialGate({ accessKeyId: 'test-key', secretAccessKey: 'test-secret' });
    const uploader = new RetryingUploader(destination, gate, { maxAttempts: 2, sleep: async () => undefined });

    const stats = await runTransfers(await listStore(source), {
      concurrency: 3,
      gate,
      worker: (object) => transferObject(object, { source, destination, uploader, stagingRoot }),
    });

    expect(stats).toMatchObject({ total: 6, uploaded: 2, skipped: 1, markersCreated: 1, failed: 2 });
    expect(listFiles(stagingRoot)).toEqual([]);
  });
});
