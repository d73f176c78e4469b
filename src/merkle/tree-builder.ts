import { EMPTY_ROOT, sha256Hex } from "./hash.js";
import type { MerkleNode, MerkleTree } from "./types.js";

/**
 * Build a binary Merkle tree bottom-up from ordered leaf hashes.
 *
 * Parents hash the hex text of both children concatenated, not the decoded
 * bytes. A level with an odd node count pairs its last node with itself.
 */
export function buildMerkleTree(leafHashes: readonly string[]): MerkleTree {
  const [first] = leafHashes;
  if (first === undefined) {
    return {
      root: { hash: EMPTY_ROOT, isLeaf: true },
      rootHash: EMPTY_ROOT,
      depth: 0,
      leafCount: 0,
    };
  }

  if (leafHashes.length === 1) {
    return {
      root: { hash: first, isLeaf: true },
      rootHash: first,
      depth: 0,
      leafCount: 1,
    };
  }

  let level: MerkleNode[] = leafHashes.map((hash) => ({ hash, isLeaf: true }));
  while (level.length > 1) {
    level = combineLevel(level);
  }

  const [root] = level;
  if (!root) {
    throw new Error("Merkle construction produced no root");
  }

  return {
    root,
    rootHash: root.hash,
    depth: computeTreeDepth(root),
    leafCount: leafHashes.length,
  };
}

export function computeTreeDepth(node: MerkleNode, depth = 0): number {
  if (node.isLeaf) {
    return depth;
  }
  const leftDepth = node.left ? computeTreeDepth(node.left, depth + 1) : depth;
  const rightDepth = node.right
    ? computeTreeDepth(node.right, depth + 1)
    : depth;
  return Math.max(leftDepth, rightDepth);
}

export function hashPair(left: string, right: string): string {
  return sha256Hex(left + right);
}

function combineLevel(nodes: readonly MerkleNode[]): MerkleNode[] {
  const next: MerkleNode[] = [];
  for (let index = 0; index < nodes.length; index += 2) {
    const left = nodes[index];
    if (!left) {
      break;
    }
    const right = nodes[index + 1] ?? left;
    next.push({
      hash: hashPair(left.hash, right.hash),
      left,
      right,
      isLeaf: false,
    });
  }
  return next;
}
