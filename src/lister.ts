// Local imports
import { logVerbose } from './logger';

export interface ListableStore<T> {
  readonly name: string;
  listObjects(): AsyncIterable<T[]>;
}

/**
 * Drain every listing page of a store into one snapshot.
 * Listing errors propagate to the caller; a failed listing is a setup error, not a transient one.
 */
export async function listStore<T>(store: ListableStore<T>): Promise<T[]> {
  const objects: T[] = [];

  for await (const page of store.listObjects()) {
    for (const object of page) {
      objects.push(object);
    }
  }

  logVerbose(`Retrieved ${objects.length} objects from ${store.name}.`);
  return objects;
}
