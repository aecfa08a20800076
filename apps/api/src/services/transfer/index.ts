/**
 * Transfer - Main Export
 */

export {
  exportIdentity,
  serializeExport,
  parseExport,
  importIdentity,
  mergeRecords,
  listIdentities,
  type ImportOptions,
} from "./transfer.js";
