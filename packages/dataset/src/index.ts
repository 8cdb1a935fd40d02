export {
  loadDataset,
  detectFormat,
  castCell,
  parseCsvTable,
  parseJsonTable,
  parseJsonLinesTable,
  type DatasetFormat,
} from './load'
