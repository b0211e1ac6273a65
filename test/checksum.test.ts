import * as fs from 'node:fs';
import * as path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { calculateFileMd5, decideTransfer, normalizeEtag, TransferDecision } from '../src/checksum';
import { makeTempDir, md5 } from './helpers/memory-stores';

describe('checksum', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('calculateFileMd5', () => {
    it('returns the lowercase hex digest of a file', async () => {
      const file = path.join(dir, 'hello.txt');
      fs.writeFileSync(file, 'hello world');

      expect(await calculateFileMd5(file)).toBe('5eb63bbbe01eeed093cb22bb8f5acdc3');
    });

    it('hashes an empty file', async () => {
      const file = path.join(dir, 'empty');
      fs.writeFileSync(file, '');

      expect(await calculateFileMd5(file)).toBe('d41d8cd98f00b204e9800998ecf8427e');
    });

    it('covers files spanning many read chunks', async () => {
      const content = Buffer.alloc(10_000, 'abc');
      const file = path.join(dir, 'large.bin');
      fs.writeFileSync(file, content);

      expect(await calculateFileMd5(file)).toBe(md5(content));
    });

    it('rejects when the file does not exist', async () => {
      await expect(calculateFileMd5(path.join(dir, 'missing'))).rejects.toThrow(/ENOENT/);
    });
  });

  describe('normalizeEtag', () => {
    it('strips surrounding quotes', () => {
      expect(normalizeEtag('"5eb63bbbe01eeed093cb22bb8f5acdc3"')).toBe('5eb63bbbe01eeed093cb22bb8f5acdc3');
    });

    it('leaves unquoted values alone', () => {
      expect(normalizeEtag('abc')).toBe('abc');
    });
  });

  describe('decideTransfer', () => {
    const digest = '5eb63bbbe01eeed093cb22bb8f5acdc3';

    it('uploads objects missing from the destination', () => {
      expect(decideTransfer(digest, undefined)).toBe(TransferDecision.NEEDS_UPLOAD);
    });

    it('skips objects whose ETag equals the local digest', () => {
      expect(decideTransfer(digest, `"${digest}"`)).toBe(TransferDecision.UP_TO_DATE);
    });

    it('compares case-insensitively', () => {
      expect(decideTransfer(digest, digest.toUpperCase())).toBe(TransferDecision.UP_TO_DATE);
    });

    it('uploads objects whose content changed', () => {
      expect(decideTransfer(digest, '"d41d8cd98f00b204e9800998ecf8427e"')).toBe(TransferDecision.NEEDS_UPLOAD);
    });

    it('treats multipart ETags as changed', () => {
      expect(decideTransfer(digest, `"${digest}-3"`)).toBe(TransferDecision.NEEDS_UPLOAD);
    });
  });
});
