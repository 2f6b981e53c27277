export {
  writeDataset,
  readDataset,
  recordToRow,
  rowToRecord,
  type DatasetReadResult,
} from './csv.js';
