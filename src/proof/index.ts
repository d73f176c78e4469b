export {
  CONFIG_FILE,
  applyConfigOverrides,
  defaultProofConfig,
  loadProofConfig,
  parseLeafOrder,
} from "./proof-config.js";
export { generateProof, orderLeaves, writeProof } from "./generator.js";
export {
  parseProofDocument,
  verifyProofDocument,
  verifyProofFile,
} from "./verifier.js";
export { VERIFICATION_METHOD } from "./types.js";
export type {
  GenerationResult,
  LeafOrder,
  ProofConfig,
  ProofDocument,
  VerifiableProof,
  VerificationOutcome,
  VerifyOptions,
} from "./types.js";
