import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { runChainsCommand } from "../../src/cli/chains-command.js";
import { runGenerateCommand } from "../../src/cli/generate-command.js";
import { runRegistryCommand } from "../../src/cli/registry-command.js";
import { runVerifyCommand } from "../../src/cli/verify-command.js";
import { sha256Hex } from "../../src/merkle/hash.js";
import { hashPair } from "../../src/merkle/tree-builder.js";

const CONTRACT = "16_codex/contracts/sot/sot_contract.yaml";
const PROOF = "02_audit_logging/proof/proof_of_detection.json";
const NOW = new Date("2026-01-02T03:04:05.000Z");

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "merkle-audit-cli-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

async function writeContract(): Promise<void> {
  const contractPath = path.join(tempDir, CONTRACT);
  await fs.mkdir(path.dirname(contractPath), { recursive: true });
  await fs.writeFile(
    contractPath,
    [
      "rules:",
      "  - id: GDPR-001",
      "    description: Lawful basis",
      "    priority: high",
      "    category: gdpr",
      "  - id: DORA-004",
      "    description: Incident reporting",
      "    priority: medium",
      "    category: dora",
    ].join("\n"),
    "utf8",
  );
}

describe("cli commands", () => {
  it("generates a proof that verifies", async () => {
    await writeContract();

    const generated = await runGenerateCommand({ root: tempDir, now: NOW });
    expect(generated.exitCode).toBe(0);
    expect(
      generated.verdict.startsWith("PASS Proof-of-Detection complete: 2 rules"),
    ).toBe(true);
    expect(generated.output).toContain(`Saved to: ${PROOF}`);

    const verified = await runVerifyCommand({ root: tempDir });
    expect(verified.exitCode).toBe(0);
    expect(verified.verdict).toBe("PASS Proof VALID - Merkle roots match");
  });

  it("fails verification after a leaf is altered", async () => {
    await writeContract();
    await runGenerateCommand({ root: tempDir, now: NOW });

    const proofPath = path.join(tempDir, PROOF);
    const proof = JSON.parse(await fs.readFile(proofPath, "utf8")) as {
      rule_hashes: Array<{ hash: string }>;
    };
    const [first] = proof.rule_hashes;
    if (first) {
      first.hash = sha256Hex("forged");
    }
    await fs.writeFile(proofPath, JSON.stringify(proof, null, 2), "utf8");

    const verified = await runVerifyCommand({ root: tempDir });
    expect(verified.exitCode).toBe(1);
    expect(verified.verdict).toBe("FAIL Proof INVALID - Merkle root mismatch");
  });

  it("reports a missing proof as a failed verification", async () => {
    const verified = await runVerifyCommand({ root: tempDir });
    expect(verified.exitCode).toBe(1);
    expect(verified.verdict).toBe("FAIL Proof could not be verified");
    expect(verified.output).toContain(
      `[ERROR] Proof file not found: ${path.join(tempDir, PROOF)}`,
    );
  });

  it("still exits 0 when generating from a missing contract", async () => {
    const generated = await runGenerateCommand({ root: tempDir, now: NOW });
    expect(generated.exitCode).toBe(0);
    expect(generated.verdict.startsWith("WARN ")).toBe(true);
    await expect(fs.access(path.join(tempDir, PROOF))).resolves.toBeUndefined();
  });

  it("refuses a partial proof in strict mode", async () => {
    const generated = await runGenerateCommand({
      root: tempDir,
      strict: true,
      now: NOW,
    });
    expect(generated.exitCode).toBe(1);
    expect(generated.verdict).toBe(
      "FAIL Partial proof not written: 2 warning(s)",
    );
    await expect(fs.access(path.join(tempDir, PROOF))).rejects.toThrow();
  });

  it("prints a json summary with explicit paths", async () => {
    await writeContract();
    const outputPath = path.join(tempDir, "out", "proof.json");

    const generated = await runGenerateCommand({
      root: tempDir,
      contracts: [path.join(tempDir, CONTRACT)],
      output: outputPath,
      order: "rule-id",
      format: "json",
      now: NOW,
    });

    const parsed = JSON.parse(generated.output) as {
      output: string;
      total_rules: number;
      tree_depth: number;
      warnings: unknown[];
    };
    expect(parsed.output).toBe("out/proof.json");
    expect(parsed.total_rules).toBe(2);
    expect(parsed.tree_depth).toBe(1);
    expect(parsed.warnings).toEqual([]);

    const verified = await runVerifyCommand({
      root: tempDir,
      proof: outputPath,
      strict: true,
    });
    expect(verified.exitCode).toBe(0);
  });

  it("requires --standard and --rule together", async () => {
    await expect(
      runRegistryCommand({ root: tempDir, standard: "soc2" }),
    ).rejects.toThrow("--standard and --rule must be given together");
  });

  it("verifies an empty registry as compliant", async () => {
    const registryPath = path.join(tempDir, "registry.json");
    await fs.writeFile(
      registryPath,
      JSON.stringify({
        metadata: { total_rules: 0, generated_at: "2026-01-01T00:00:00Z" },
        standards: { soc2: { name: "SOC 2", rules: {} } },
      }),
      "utf8",
    );

    const result = await runRegistryCommand({
      root: tempDir,
      registry: registryPath,
    });
    expect(result.exitCode).toBe(0);
    expect(result.verdict).toBe(
      "PASS FULL COMPLIANCE - All Merkle trees verified",
    );
    expect(result.output.split("\n")[0]).toBe(
      "Registry loaded: 0 rules (generated 2026-01-01T00:00:00Z)",
    );
  });

  it("fails chains below the requested pass rate", async () => {
    const evidenceDir = path.join(tempDir, "02_audit_logging", "evidence");
    await fs.mkdir(evidenceDir, { recursive: true });
    const hash = sha256Hex("block");
    await fs.writeFile(
      path.join(evidenceDir, "ok_merkle.json"),
      JSON.stringify({ hashes: [hash], merkle_root: hashPair(hash, hash) }),
      "utf8",
    );
    await fs.writeFile(
      path.join(evidenceDir, "bad_merkle.json"),
      JSON.stringify({ merkle_root: "bad" }),
      "utf8",
    );
    await fs.writeFile(
      path.join(evidenceDir, "worse_merkle.json"),
      "[",
      "utf8",
    );

    const result = await runChainsCommand({
      root: tempDir,
      failUnder: 50,
      now: NOW,
    });
    expect(result.exitCode).toBe(2);
    expect(result.verdict).toBe("FAIL Pass rate 33.3% is below 50.0%");
    expect(result.output).toContain(
      "Results saved: 02_audit_logging/reports/merkle_proof_validation.json",
    );
  });
});
