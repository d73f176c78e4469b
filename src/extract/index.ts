export {
  extractContractLeaves,
  normalizeContractRule,
  toRepoRelative,
} from "./contract-extractor.js";
export type {
  ExtractionResult,
  LeafRecord,
  ProofWarning,
  ProofWarningKind,
} from "./types.js";
