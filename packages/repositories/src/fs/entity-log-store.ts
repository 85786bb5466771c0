// Filesystem implementation of EntityLogStore.
//
// Layout inside the data directory:
//   entities.snapshot.json  compacted state, replaced atomically
//   entities.log.ndjson     one record per line, appended and fsynced
//
// A crash during an append can leave a final line without its newline.
// load() drops an unparseable fragment, keeps a complete record, and in
// both cases atomically rewrites the log so it ends in a newline and the
// next append starts on a clean line.

import * as path from 'node:path';
import type { EntityLogRecord, EntitySnapshot } from '@cmdbridge/protocol';
import { parseNdjsonDetailed, stringifyNdjson } from '@cmdbridge/protocol';
import type { EntityLogState, EntityLogStore } from '../interfaces/index.js';
import {
  appendFileDurable,
  readFileIfExists,
  removeStaleTempFiles,
  writeFileAtomic,
} from './atomic.js';

export const SNAPSHOT_FILE_NAME = 'entities.snapshot.json';
export const LOG_FILE_NAME = 'entities.log.ndjson';

export type FilesystemEntityLogStoreOptions = {
  /** Directory holding the snapshot and log */
  directory: string;
};

/**
 * Create an EntityLogStore backed by files in a directory.
 */
export function createFilesystemEntityLogStore(
  options: FilesystemEntityLogStoreOptions
): EntityLogStore {
  const snapshotPath = path.join(options.directory, SNAPSHOT_FILE_NAME);
  const logPath = path.join(options.directory, LOG_FILE_NAME);

  async function readSnapshot(): Promise<EntitySnapshot | null> {
    const content = await readFileIfExists(snapshotPath);
    if (content === null) {
      return null;
    }

    const parsed: unknown = JSON.parse(content);
    if (!isSnapshot(parsed)) {
      throw new Error(`Unsupported entity snapshot format in ${snapshotPath}`);
    }
    return parsed;
  }

  async function readLog(): Promise<{ records: EntityLogRecord[]; tornTail: boolean }> {
    const content = await readFileIfExists(logPath);
    if (content === null) {
      return { records: [], tornTail: false };
    }

    const { items, droppedTail } = parseNdjsonDetailed<EntityLogRecord>(content, {
      tolerateTornTail: true,
    });
    const unterminated = content.length > 0 && !content.endsWith('\n');
    return { records: items, tornTail: droppedTail !== null || unterminated };
  }

  return {
    async load(): Promise<EntityLogState> {
      await removeStaleTempFiles(snapshotPath);
      await removeStaleTempFiles(logPath);

      const snapshot = await readSnapshot();
      const { records, tornTail } = await readLog();

      if (tornTail) {
        await writeFileAtomic(logPath, stringifyNdjson(records));
      }

      return { snapshot, records, repairedTornWrite: tornTail };
    },

    async append(records: EntityLogRecord[]): Promise<void> {
      if (records.length === 0) {
        return;
      }
      await appendFileDurable(logPath, stringifyNdjson(records));
    },

    async compact(snapshot: EntitySnapshot): Promise<void> {
      await writeFileAtomic(snapshotPath, JSON.stringify(snapshot));

      // The snapshot is durable at this point. A crash before the log
      // rewrite leaves records the loader will skip by sequence.
      const { records } = await readLog();
      const remaining = records.filter((record) => record.sequence > snapshot.lastSequence);
      await writeFileAtomic(logPath, stringifyNdjson(remaining));
    },

    async close(): Promise<void> {},
  };
}

function isSnapshot(value: unknown): value is EntitySnapshot {
  return (
    typeof value === 'object' &&
    value !== null &&
    'version' in value &&
    value.version === 1 &&
    'lastSequence' in value &&
    typeof value.lastSequence === 'number' &&
    'entities' in value &&
    Array.isArray(value.entities)
  );
}
