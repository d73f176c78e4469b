export { loadRegistry, parseRegistry } from "./registry-loader.js";
export {
  hashFile,
  isRegistryCompliant,
  verifyRegistry,
  verifyRegistryRule,
  verifySingleRule,
} from "./registry-verifier.js";
export { MANIFESTATION_TYPES } from "./types.js";
export type {
  ComplianceRegistry,
  HashMismatch,
  Manifestation,
  ManifestationType,
  RegistryReport,
  RegistryRule,
  RegistryStandard,
  RegistrySummary,
  RuleStatus,
  RuleVerification,
  StandardVerification,
} from "./types.js";
