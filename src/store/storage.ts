import { promises as fs } from 'fs';
import path from 'path';
import type { StateStorage } from 'zustand/middleware';
import { getDataDir, isDevEnvironment } from '../utils/getEnv';

/**
 * Storage backends for zustand `persist`.
 *
 * Stores are created at import time and `createJSONStorage` resolves its
 * factory once, so every store is handed `stateStorage`, a thin proxy that
 * forwards to whichever backend `configureStateStorage` last selected.
 */

export function persistKey(store: string): string {
  return `routines-${store}-v1`;
}

export function createMemoryStateStorage(seed: Record<string, string> = {}): StateStorage & {
  keys: () => string[];
} {
  const items = new Map<string, string>(Object.entries(seed));
  return {
    getItem: (name) => items.get(name) ?? null,
    setItem: (name, value) => {
      items.set(name, value);
    },
    removeItem: (name) => {
      items.delete(name);
    },
    keys: () => Array.from(items.keys()),
  };
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function fileNameForKey(key: string): string {
  return `${key.replace(/[^A-Za-z0-9._-]/g, '_')}.json`;
}

/**
 * One JSON file per key under `dir`. Writes go to a sibling `.tmp` file that is
 * renamed over the target, so a crash mid-write never leaves a torn file.
 *
 * `persist` fires `setItem` on every `set()` without awaiting it, so writes and
 * removals for a key are chained and run one at a time. Reads wait for the
 * chain. A failed write is logged and does not break the chain.
 */
export function createFileStateStorage(dir: string): StateStorage {
  const filePath = (name: string) => path.join(dir, fileNameForKey(name));
  const pending = new Map<string, Promise<void>>();

  const enqueue = (name: string, op: () => Promise<void>): Promise<void> => {
    const next = (pending.get(name) ?? Promise.resolve()).then(op).catch((error: unknown) => {
      console.warn('[storage] write failed', { name, error });
    });
    pending.set(name, next);
    return next;
  };

  return {
    getItem: async (name) => {
      await pending.get(name);
      try {
        return await fs.readFile(filePath(name), 'utf-8');
      } catch (error) {
        if (isMissingFileError(error)) return null;
        throw error;
      }
    },
    setItem: (name, value) =>
      enqueue(name, async () => {
        const target = filePath(name);
        const tmp = `${target}.tmp`;
        await fs.mkdir(dir, { recursive: true });
        await fs.writeFile(tmp, value, 'utf-8');
        await fs.rename(tmp, target);
      }),
    removeItem: (name) =>
      enqueue(name, async () => {
        try {
          await fs.unlink(filePath(name));
        } catch (error) {
          if (!isMissingFileError(error)) throw error;
        }
      }),
  };
}

export function createDefaultStateStorage(): StateStorage {
  const dir = getDataDir();
  if (dir) return createFileStateStorage(dir);
  if (isDevEnvironment()) {
    console.warn('[storage] ROUTINES_DATA_DIR is not set; state is kept in memory only.');
  }
  return createMemoryStateStorage();
}

let activeStorage: StateStorage = createMemoryStateStorage();

export function configureStateStorage(storage: StateStorage): void {
  activeStorage = storage;
}

export function getActiveStateStorage(): StateStorage {
  return activeStorage;
}

export const stateStorage: StateStorage = {
  getItem: (name) => activeStorage.getItem(name),
  setItem: (name, value) => activeStorage.setItem(name, value),
  removeItem: (name) => activeStorage.removeItem(name),
};
