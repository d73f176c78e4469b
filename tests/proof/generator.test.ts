import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EMPTY_ROOT } from "../../src/merkle/hash.js";
import { buildMerkleTree } from "../../src/merkle/tree-builder.js";
import { generateProof, writeProof } from "../../src/proof/generator.js";
import {
  applyConfigOverrides,
  defaultProofConfig,
} from "../../src/proof/proof-config.js";
import { verifyProofFile } from "../../src/proof/verifier.js";
import type { LeafOrder, ProofConfig } from "../../src/proof/types.js";

const NOW = new Date("2026-01-02T03:04:05.000Z");

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "merkle-audit-proof-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

async function writeRules(
  relative: string,
  rules: ReadonlyArray<{ id: string; description: string }>,
): Promise<void> {
  const lines = ["rules:"];
  for (const rule of rules) {
    lines.push(`  - id: ${rule.id}`);
    lines.push(`    description: "${rule.description}"`);
    lines.push("    priority: high");
    lines.push("    category: gdpr");
  }
  await fs.writeFile(path.join(tempDir, relative), lines.join("\n"), "utf8");
}

function configFor(contracts: string[], leafOrder?: LeafOrder): ProofConfig {
  return applyConfigOverrides(defaultProofConfig(tempDir), {
    contracts,
    leafOrder,
  });
}

describe("generateProof", () => {
  it("commits to every rule of every contract", async () => {
    await writeRules("a.yaml", [
      { id: "GDPR-001", description: "Lawful basis" },
      { id: "GDPR-002", description: "Right to erasure" },
    ]);
    await writeRules("b.yaml", [{ id: "DORA-001", description: "ICT risk" }]);

    const { proof, warnings } = await generateProof(
      configFor(["a.yaml", "b.yaml"]),
      { now: NOW },
    );

    expect(warnings).toEqual([]);
    expect(proof.total_rules).toBe(3);
    expect(proof.rule_hashes.map((leaf) => leaf.rule_id)).toEqual([
      "GDPR-001",
      "GDPR-002",
      "DORA-001",
    ]);
    expect(proof.source_files).toEqual(["a.yaml", "b.yaml"]);
    expect(proof.timestamp).toBe("2026-01-02T03:04:05.000Z");
    expect(proof.verification_method).toBe("merkle_tree_sha256");
    const tree = buildMerkleTree(proof.rule_hashes.map((leaf) => leaf.hash));
    expect(proof.merkle_root).toBe(tree.rootHash);
    expect(proof.tree_depth).toBe(2);
  });

  it("sorts leaves by rule id in code-unit order when asked", async () => {
    await writeRules("a.yaml", [
      { id: "B-2", description: "second" },
      { id: "a-0", description: "lower" },
      { id: "A-1", description: "first" },
    ]);

    const bySource = await generateProof(configFor(["a.yaml"]), { now: NOW });
    const byId = await generateProof(configFor(["a.yaml"], "rule-id"), {
      now: NOW,
    });

    expect(bySource.proof.rule_hashes.map((leaf) => leaf.rule_id)).toEqual([
      "B-2",
      "a-0",
      "A-1",
    ]);
    expect(byId.proof.rule_hashes.map((leaf) => leaf.rule_id)).toEqual([
      "A-1",
      "B-2",
      "a-0",
    ]);
    expect(byId.proof.merkle_root).not.toBe(bySource.proof.merkle_root);
  });

  it("flags duplicate rule ids across contracts", async () => {
    await writeRules("a.yaml", [{ id: "AMLD-7", description: "one" }]);
    await writeRules("b.yaml", [{ id: "AMLD-7", description: "two" }]);

    const { proof, warnings } = await generateProof(
      configFor(["a.yaml", "b.yaml"]),
      { now: NOW },
    );

    expect(proof.total_rules).toBe(2);
    expect(warnings).toEqual([
      {
        kind: "duplicate-rule-id",
        source: "b.yaml",
        message: "Rule AMLD-7 appears at a.yaml#1 and b.yaml#1",
      },
    ]);
  });

  it("produces the empty proof with warnings when no contract exists", async () => {
    const { proof, warnings } = await generateProof(
      defaultProofConfig(tempDir),
      { now: NOW },
    );

    expect(proof.merkle_root).toBe(EMPTY_ROOT);
    expect(proof.total_rules).toBe(0);
    expect(proof.tree_depth).toBe(0);
    expect(proof.source_files).toEqual([]);
    expect(warnings.map((warning) => warning.kind)).toEqual([
      "missing-source",
      "empty-source",
    ]);
  });

  it("leaves contracts without rules out of source_files", async () => {
    await writeRules("a.yaml", [{ id: "MICA-1", description: "Whitepaper" }]);
    await fs.writeFile(path.join(tempDir, "empty.yaml"), "rules: []", "utf8");

    const { proof, warnings } = await generateProof(
      configFor(["a.yaml", "empty.yaml"]),
      { now: NOW },
    );

    expect(proof.source_files).toEqual(["a.yaml"]);
    expect(proof.merkle_root).toBe(proof.rule_hashes[0]?.hash);
    expect(warnings).toEqual([]);
  });
});

describe("writeProof", () => {
  it("writes indented json that verifies", async () => {
    await writeRules("a.yaml", [
      { id: "GDPR-009", description: "Datenschutz für Kinder" },
      { id: "GDPR-010", description: "Consent records" },
    ]);
    const config = configFor(["a.yaml"]);
    const { proof } = await generateProof(config, { now: NOW });

    await writeProof(config.outputPath, proof);

    const raw = await fs.readFile(config.outputPath, "utf8");
    expect(raw).toBe(JSON.stringify(proof, null, 2));
    expect(raw).toContain("Datenschutz für Kinder");

    const verified = await verifyProofFile(config.outputPath, { strict: true });
    expect(verified.ok).toBe(true);
    if (verified.ok) {
      expect(verified.value.valid).toBe(true);
    }
  });
});
