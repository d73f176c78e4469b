export { chainGrade, renderChainReport } from "./chain-reporter.js";
export {
  renderGenerationReport,
  renderVerificationFailure,
  renderVerificationReport,
  renderWarnings,
} from "./proof-reporter.js";
export { renderRegistryReport, renderRuleReport } from "./registry-reporter.js";
export {
  formatPercent,
  renderAsciiBox,
  renderAsciiTable,
  truncateHash,
} from "./report-utils.js";
