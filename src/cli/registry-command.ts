import { loadRegistry } from "../registry/registry-loader.js";
import {
  isRegistryCompliant,
  verifyRegistry,
  verifySingleRule,
} from "../registry/registry-verifier.js";
import {
  renderRegistryReport,
  renderRuleReport,
} from "../report/registry-reporter.js";
import { loadCommandConfig } from "./runtime-paths.js";
import type { CommandResult, RepoOptions } from "./types.js";

export interface RegistryOptions extends RepoOptions {
  readonly registry?: string;
  readonly standard?: string;
  readonly rule?: string;
  readonly json?: boolean;
  readonly verbose?: boolean;
  readonly now?: Date;
}

export async function runRegistryCommand(
  options: RegistryOptions,
): Promise<CommandResult> {
  if (Boolean(options.standard) !== Boolean(options.rule)) {
    throw new Error("--standard and --rule must be given together");
  }

  const config = await loadCommandConfig(options, {
    registry: options.registry,
  });
  const registry = await loadRegistry(config.registryPath);
  const header = `Registry loaded: ${registry.metadata.total_rules} rules (generated ${registry.metadata.generated_at})`;

  if (options.standard && options.rule) {
    const result = await verifySingleRule(
      registry,
      options.standard,
      options.rule,
      config.repoRoot,
    );
    if (!result.ok) {
      return {
        output: `${header}\n[ERROR] ${result.error.message}`,
        verdict: "FAIL Rule could not be verified",
        exitCode: 1,
      };
    }
    const valid = result.value.status === "valid";
    return {
      output: `${header}\n\n${renderRuleReport(options.standard, result.value)}`,
      verdict: valid
        ? "PASS RESULT: VALID - Merkle tree verified"
        : "FAIL RESULT: INVALID - Merkle verification failed",
      exitCode: valid ? 0 : 1,
    };
  }

  const report = await verifyRegistry(registry, config.repoRoot, options.now);
  const output = options.json
    ? JSON.stringify(report, null, 2)
    : `${header}\n\n${renderRegistryReport(report, { verbose: options.verbose })}`;

  if (isRegistryCompliant(report)) {
    return {
      output,
      verdict: "PASS FULL COMPLIANCE - All Merkle trees verified",
      exitCode: 0,
    };
  }
  const { summary } = report;
  return {
    output,
    verdict: `FAIL COMPLIANCE VIOLATIONS DETECTED - ${summary.invalid_rules} failed, ${summary.partial_rules} partial`,
    exitCode: 1,
  };
}
