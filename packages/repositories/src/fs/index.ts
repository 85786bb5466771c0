// Filesystem persistence for the entity registry

export {
  createFilesystemEntityLogStore,
  SNAPSHOT_FILE_NAME,
  LOG_FILE_NAME,
  type FilesystemEntityLogStoreOptions,
} from './entity-log-store.js';
export { writeFileAtomic, appendFileDurable, readFileIfExists } from './atomic.js';
