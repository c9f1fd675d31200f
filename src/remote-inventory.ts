import { normalizeEtag } from './etag';
import { ObjectStorage, RemoteInventory, RemoteObjectRecord, StoredObject } from './types';
import { toUnixSeconds } from './utils';

export function toRemoteRecord(object: StoredObject): RemoteObjectRecord {
  return {
    key: object.key,
    hash: normalizeEtag(object.etag),
    size: object.size,
    lastModified: toUnixSeconds(object.lastModified),
  };
}

/**
 * Lists every object under `prefix` and indexes it by key.
 * An empty bucket gives an empty map.
 */
export async function fetchRemoteInventory(storage: ObjectStorage, prefix: string = ''): Promise<RemoteInventory> {
  const objects = await storage.listObjects(prefix);
  const inventory: RemoteInventory = new Map();

  for (const object of objects) {
    inventory.set(object.key, toRemoteRecord(object));
  }

  return inventory;
}
