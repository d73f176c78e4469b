import path from "node:path";
import { verifyProofFile } from "../proof/verifier.js";
import {
  renderVerificationFailure,
  renderVerificationReport,
} from "../report/proof-reporter.js";
import { loadCommandConfig } from "./runtime-paths.js";
import type { CommandResult, RepoOptions } from "./types.js";

export interface VerifyOptions extends RepoOptions {
  readonly proof?: string;
  readonly strict?: boolean;
}

export async function runVerifyCommand(
  options: VerifyOptions,
): Promise<CommandResult> {
  const config = await loadCommandConfig(options);
  const proofPath = options.proof
    ? path.resolve(options.proof)
    : config.outputPath;

  const result = await verifyProofFile(proofPath, { strict: options.strict });
  if (!result.ok) {
    return {
      output: renderVerificationFailure(proofPath, result.error),
      verdict: "FAIL Proof could not be verified",
      exitCode: 1,
    };
  }

  const outcome = result.value;
  const output = renderVerificationReport(proofPath, outcome);
  if (outcome.valid) {
    return {
      output,
      verdict: "PASS Proof VALID - Merkle roots match",
      exitCode: 0,
    };
  }
  const reason = outcome.issues[0] ?? "Merkle root mismatch";
  return { output, verdict: `FAIL Proof INVALID - ${reason}`, exitCode: 1 };
}
