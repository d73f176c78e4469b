#!/usr/bin/env node
import { Command } from "commander";
import { parseLeafOrder } from "../proof/proof-config.js";
import type { LeafOrder } from "../proof/types.js";
import { runChainsCommand } from "./chains-command.js";
import { runGenerateCommand } from "./generate-command.js";
import { runRegistryCommand } from "./registry-command.js";
import { loadVersion } from "./runtime-paths.js";
import type { CommandResult } from "./types.js";
import { runVerifyCommand } from "./verify-command.js";

interface GlobalFlags {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
}

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("merkle-audit")
  .description("Merkle proof-of-detection for compliance rule sets")
  .version(toolVersion)
  .option("--verbose", "Verbose output")
  .option("--quiet", "Print only the verdict line");

program
  .command("generate")
  .description("Hash every contract rule and write a proof-of-detection")
  .option("--root <dir>", "Repository root (default: working directory)")
  .option("--config <path>", "Config file (default: <root>/merkle-audit.yaml)")
  .option("--contract <path...>", "Rule contract YAML file(s)")
  .option("--output <path>", "Where to write the proof JSON")
  .option("--order <order>", "Leaf order (source|rule-id)")
  .option("--strict", "Fail and write nothing when any source is missing")
  .option("--format <format>", "Output format (text|json)", "text")
  .action(async (options) => {
    await execute(() =>
      runGenerateCommand({
        root: options.root,
        config: options.config,
        contracts: options.contract,
        output: options.output,
        order: options.order ? parseOrder(options.order) : undefined,
        strict: Boolean(options.strict),
        format: parseFormat(options.format),
        verbose: globalFlags().verbose,
      }),
    );
  });

program
  .command("verify")
  .description("Rebuild the Merkle root of a stored proof and compare it")
  .option("--root <dir>", "Repository root (default: working directory)")
  .option("--config <path>", "Config file (default: <root>/merkle-audit.yaml)")
  .option("--proof <path>", "Proof JSON to verify")
  .option("--strict", "Also check total_rules and tree_depth")
  .action(async (options) => {
    await execute(() =>
      runVerifyCommand({
        root: options.root,
        config: options.config,
        proof: options.proof,
        strict: Boolean(options.strict),
      }),
    );
  });

program
  .command("registry")
  .description("Verify per-rule manifestation hashes of a compliance registry")
  .option("--root <dir>", "Repository root (default: working directory)")
  .option("--config <path>", "Config file (default: <root>/merkle-audit.yaml)")
  .option("--registry <path>", "Compliance registry JSON")
  .option("-s, --standard <key>", "Standard to verify (with --rule)")
  .option("-r, --rule <id>", "Rule id to verify (with --standard)")
  .option("--json", "Print the full result as JSON")
  .action(async (options) => {
    await execute(() =>
      runRegistryCommand({
        root: options.root,
        config: options.config,
        registry: options.registry,
        standard: options.standard,
        rule: options.rule,
        json: Boolean(options.json),
        verbose: globalFlags().verbose,
      }),
    );
  });

program
  .command("chains")
  .description("Validate Merkle proof-chain evidence files")
  .option("--root <dir>", "Repository root (default: working directory)")
  .option("--config <path>", "Config file (default: <root>/merkle-audit.yaml)")
  .option("--evidence-dir <path>", "Directory holding chain files")
  .option("--reports-dir <path>", "Directory for the validation report")
  .option("--fail-under <rate>", "Exit with error if pass rate % is below")
  .action(async (options) => {
    await execute(() =>
      runChainsCommand({
        root: options.root,
        config: options.config,
        evidenceDir: options.evidenceDir,
        reportsDir: options.reportsDir,
        failUnder: options.failUnder
          ? parseRate(options.failUnder)
          : undefined,
      }),
    );
  });

function globalFlags(): GlobalFlags {
  return program.opts<GlobalFlags>();
}

async function execute(run: () => Promise<CommandResult>): Promise<void> {
  try {
    const result = await run();
    if (globalFlags().quiet) {
      await writeStdout(result.verdict + "\n");
    } else {
      await writeStdout(`${result.output}\n\n${result.verdict}\n`);
    }
    process.exitCode = result.exitCode;
  } catch (error) {
    await writeError(error);
    process.exitCode = 1;
  }
}

function parseOrder(value: string): LeafOrder {
  const order = parseLeafOrder(value);
  if (!order) {
    throw new Error(`Unsupported leaf order: ${value}`);
  }
  return order;
}

function parseFormat(value: string): "text" | "json" {
  if (value === "text" || value === "json") {
    return value;
  }
  throw new Error(`Unsupported format: ${value}`);
}

function parseRate(value: string): number {
  const rate = Number(value);
  if (!Number.isFinite(rate) || rate < 0 || rate > 100) {
    throw new Error(`--fail-under must be a percentage, got: ${value}`);
  }
  return rate;
}

async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

async function writeError(error: unknown): Promise<void> {
  const message = error instanceof Error ? error.message : String(error);
  await new Promise<void>((resolve) => {
    process.stderr.write(message + "\n", () => resolve());
  });
}

await program.parseAsync(process.argv);
