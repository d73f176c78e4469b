export {
  CHAIN_REPORT_FILE,
  chainPassRate,
  computeChainRoot,
  findChainFiles,
  validateChainDocument,
  validateChainFile,
  validateEvidenceDirectory,
  writeChainReport,
} from "./chain-validator.js";
export type {
  ChainReport,
  ChainStatus,
  ChainSummary,
  ChainValidation,
} from "./types.js";
