export {
  serializeExport,
  deserializeExport,
  recordsFromExport,
  toExport,
  saveExport,
  loadExport,
  ExportFormatError,
  DEFAULT_EXPORT_FILENAME,
} from "./serialization.js";
