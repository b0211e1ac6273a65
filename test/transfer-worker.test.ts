import * as fs from 'node:fs';
import * as path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { runTransfers } from '../src/coordinator';
import { CredentialGate } from '../src/credentials';
import { listStore } from '../src/lister';
import { resolveStagingPath, transferObject } from '../src/transfer-worker';
import { TransferStatus } from '../src/types';
import { RetryingUploader } from '../src/uploader';
import { InMemoryDestinationStore, InMemorySourceStore, listFiles, makeTempDir } from './helpers/memory-stores';

import type { TransferContext } from '../src/transfer-worker';
import type { SourceObject } from '../src/types';

function sourceObject(key: string): SourceObject {
  return { key, size: 0, isDirectoryMarker: key.endsWith('/') };
}

describe('transferObject', () => {
  let stagingRoot: string;
  let source: InMemorySourceStore;
  let destination: InMemoryDestinationStore;
  let statuses: TransferStatus[];
  let context: TransferContext;

  beforeEach(() => {
    stagingRoot = makeTempDir();
    source = new InMemorySourceStore({ 'a.txt': 'alpha', 'nested/deep/b.txt': 'beta', 'dir/': '' });
    destination = new InMemoryDestinationStore();
    statuses = [];

    const gate = new CredentialGate({ accessKeyId: 'test-key', secretAccessKey: 'test-secret' });
    context = {
      source,
      destination,
      uploader: new RetryingUploader(destination, gate, { maxAttempts: 3, sleep: async () => undefined }),
      stagingRoot,
      onStatus: (_key, status) => statuses.push(status),
    };
  });

  afterEach(() => {
    fs.rmSync(stagingRoot, { recursive: true, force: true });
  });

  it('uploads an object missing from the destination', async () => {
    const outcome = await transferObject(sourceObject('a.txt'), context);

    expect(outcome).toEqual({ key: 'a.txt', status: TransferStatus.UPLOADED, attempts: 1 });
    expect(destination.objects.get('a.txt')?.toString()).toBe('alpha');
    expect(statuses).toEqual([
      TransferStatus.PENDING,
      TransferStatus.DOWNLOADING,
      TransferStatus.CHECKSUMMING,
      TransferStatus.UPLOADING,
      TransferStatus.UPLOADED,
    ]);
    expect(fs.readdirSync(stagingRoot)).toEqual([]);
  });

  it('stages nested keys under their own directories', async () => {
    const outcome = await transferObject(sourceObject('nested/deep/b.txt'), context);

    expect(outcome.status).toBe(TransferStatus.UPLOADED);
    expect(destination.objects.get('nested/deep/b.txt')?.toString()).toBe('beta');
    expect(listFiles(stagingRoot)).toEqual([]);
  });

  it('skips an object whose ETag matches the local digest', async () => {
    destination.objects.set('a.txt', Buffer.from('alpha'));

    const outcome = await transferObject(sourceObject('a.txt'), context);

    expect(outcome).toEqual({ key: 'a.txt', status: TransferStatus.SKIPPED_UP_TO_DATE });
    expect(destination.uploads).toEqual([]);
    expect(statuses).toEqual([
      TransferStatus.PENDING,
      TransferStatus.DOWNLOADING,
      TransferStatus.CHECKSUMMING,
      TransferStatus.SKIPPED_UP_TO_DATE,
    ]);
  });

  it('overwrites an object whose content changed', async () => {
    destination.objects.set('a.txt', Buffer.from('stale'));

    const outcome = await transferObject(sourceObject('a.txt'), context);

    expect(outcome.status).toBe(TransferStatus.UPLOADED);
    expect(destination.objects.get('a.txt')?.toString()).toBe('alpha');
  });

  it('creates directory markers without downloading', async () => {
    const outcome = await transferObject(sourceObject('dir/'), context);

    expect(outcome).toEqual({ key: 'dir/', status: TransferStatus.MARKER_CREATED });
    expect(source.downloads).toEqual([]);
    expect(destination.markers).toEqual(['dir/']);
    expect(destination.objects.get('dir/')?.length).toBe(0);
    expect(statuses).toEqual([TransferStatus.PENDING, TransferStatus.MARKER_CREATED]);
  });

  it('fails without uploading when the download fails', async () => {
    source.failingDownloads.add('a.txt');

    const outcome = await transferObject(sourceObject('a.txt'), context);

    expect(outcome).toEqual({
      key: 'a.txt',
      status: TransferStatus.FAILED,
      reason: 'Failed to download from swift://memory: connection reset while reading a.txt',
    });
    expect(destination.uploads).toEqual([]);
    expect(listFiles(stagingRoot)).toEqual([]);
  });

  it('fails without uploading when the destination cannot be queried', async () => {
    destination.headError = new Error('403 Forbidden');

    const outcome = await transferObject(sourceObject('a.txt'), context);

    expect(outcome).toEqual({
      key: 'a.txt',
      status: TransferStatus.FAILED,
      reason: 'Failed to access object in s3://memory: 403 Forbidden',
    });
    expect(destination.uploads).toEqual([]);
    expect(listFiles(stagingRoot)).toEqual([]);
  });

  it('fails once the uploader gives up and still removes the staged file', async () => {
    destination.uploadFailure = () => new Error('503 Slow Down');

    const outcome = await transferObject(sourceObject('a.txt'), context);

    expect(outcome).toEqual({
      key: 'a.txt',
      status: TransferStatus.FAILED,
      reason: 'Upload failed after 3 attempt(s): 503 Slow Down',
    });
    expect(destination.uploads).toHaveLength(3);
    expect(listFiles(stagingRoot)).toEqual([]);
  });

  it('keeps keys that normalise to the same path apart while they run together', async () => {
    source = new InMemorySourceStore({ 'a//b': 'content of a//b', 'a/b': 'content of a/b, longer' });
    source.downloadDelays.set('a//b', 20);
    context.source = source;

    const stats = await runTransfers(await listStore(source), {
      concurrency: 2,
      worker: (object) => transferObject(object, context),
    });

    expect(stats).toMatchObject({ uploaded: 2, failed: 0 });
    expect(destination.objects.get('a//b')?.toString()).toBe('content of a//b');
    expect(destination.objects.get('a/b')?.toString()).toBe('content of a/b, longer');
    expect(fs.readdirSync(stagingRoot)).toEqual([]);
  });

  it('stages a key and a key nested below it at the same time', async () => {
    source = new InMemorySourceStore({ 'a': 'file a', 'a/b': 'file a/b' });
    source.downloadDelays.set('a', 20);
    context.source = source;

    const stats = await runTransfers(await listStore(source), {
      concurrency: 2,
      worker: (object) => transferObject(object, context),
    });

    expect(stats).toMatchObject({ uploaded: 2, failed: 0 });
    expect(destination.objects.get('a')?.toString()).toBe('file a');
    expect(destination.objects.get('a/b')?.toString()).toBe('file a/b');
  });

  it('refuses keys that escape the staging directory', async () => {
    const outcome = await transferObject(sourceObject('../escape.txt'), context);

    expect(outcome).toEqual({
      key: '../escape.txt',
      status: TransferStatus.FAILED,
      reason: "Object key '../escape.txt' resolves outside the staging directory",
    });
    expect(source.downloads).toEqual([]);
  });
});

describe('resolveStagingPath', () => {
  it('joins the key below the staging root', () => {
    expect(resolveStagingPath('/tmp/stage', 'photos/2024/a.jpg')).toBe(path.join('/tmp/stage', 'photos', '2024', 'a.jpg'));
  });

  it('rejects parent traversal', () => {
    expect(() => resolveStagingPath('/tmp/stage', 'photos/../../etc/passwd')).toThrow(
      "Object key 'photos/../../etc/passwd' resolves outside the staging directory"
    );
  });
});
