export {
  InMemoryDataAccess,
  createInMemoryDataAccess,
  deriveRecordId,
  loadRecordsFile,
  parseRecordsJson,
} from './in-memory-data-access.js';
