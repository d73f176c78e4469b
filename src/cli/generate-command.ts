import { toRepoRelative } from "../extract/contract-extractor.js";
import { generateProof, writeProof } from "../proof/generator.js";
import type { LeafOrder } from "../proof/types.js";
import { renderGenerationReport } from "../report/proof-reporter.js";
import { truncateHash } from "../report/report-utils.js";
import { loadCommandConfig } from "./runtime-paths.js";
import type { CommandResult, RepoOptions } from "./types.js";

export interface GenerateOptions extends RepoOptions {
  readonly contracts?: readonly string[];
  readonly output?: string;
  readonly order?: LeafOrder;
  readonly strict?: boolean;
  readonly format?: "text" | "json";
  readonly verbose?: boolean;
  readonly now?: Date;
}

export async function runGenerateCommand(
  options: GenerateOptions,
): Promise<CommandResult> {
  const config = await loadCommandConfig(options, {
    contracts: options.contracts,
    output: options.output,
    leafOrder: options.order,
  });
  const result = await generateProof(config, { now: options.now });
  const { proof, warnings } = result;
  const outputPath = toRepoRelative(config.outputPath, config.repoRoot);

  // A strict run never persists a partial proof.
  const refused = Boolean(options.strict) && warnings.length > 0;
  if (!refused) {
    await writeProof(config.outputPath, proof);
  }

  const output =
    options.format === "json"
      ? JSON.stringify(
          {
            output: refused ? null : outputPath,
            merkle_root: proof.merkle_root,
            total_rules: proof.total_rules,
            tree_depth: proof.tree_depth,
            warnings,
          },
          null,
          2,
        )
      : renderGenerationReport(result, {
          outputPath: refused ? undefined : outputPath,
          verbose: options.verbose,
        });

  if (refused) {
    return {
      output,
      verdict: `FAIL Partial proof not written: ${warnings.length} warning(s)`,
      exitCode: 1,
    };
  }

  const summary = `${proof.total_rules} rules, root ${truncateHash(proof.merkle_root)}`;
  return {
    output,
    verdict:
      warnings.length > 0
        ? `WARN Proof-of-Detection complete with ${warnings.length} warning(s): ${summary}`
        : `PASS Proof-of-Detection complete: ${summary}`,
    exitCode: 0,
  };
}
