// Postgres repository implementations
export {
  PgEntityLogStore,
  logRecordToRow,
  rowToLogRecord,
  snapshotToRow,
  rowToSnapshot,
  type EntityLogRow,
  type EntitySnapshotRow,
} from './entity-log-store.js';
