import { describe, expect, it } from 'vitest';

import { listStore } from '../src/lister';
import { InMemorySourceStore } from './helpers/memory-stores';

describe('listStore', () => {
  it('drains every page in order', async () => {
    const store = new InMemorySourceStore({ 'c.txt': 'c', 'a.txt': 'a', 'dir/': '', 'b.txt': 'bb' }, 3);

    const objects = await listStore(store);

    expect(objects).toEqual([
      { key: 'a.txt', size: 1, isDirectoryMarker: false },
      { key: 'b.txt', size: 2, isDirectoryMarker: false },
      { key: 'c.txt', size: 1, isDirectoryMarker: false },
      { key: 'dir/', size: 0, isDirectoryMarker: true },
    ]);
  });

  it('returns an empty snapshot for an empty store', async () => {
    expect(await listStore(new InMemorySourceStore())).toEqual([]);
  });

  it('propagates listing errors', async () => {
    const store = {
      name: 'swift://broken',
      async *listObjects(): AsyncGenerator<string[]> {
        yield ['a'];
        throw new Error('401 Unauthorized');
      },
    };

    await expect(listStore(store)).rejects.toThrow('401 Unauthorized');
  });
});
