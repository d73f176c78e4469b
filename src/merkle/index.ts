export {
  EMPTY_ROOT,
  computeRuleHash,
  isSha256Hex,
  normalizeRuleContent,
  sha256Hex,
} from "./hash.js";
export { buildMerkleTree, computeTreeDepth, hashPair } from "./tree-builder.js";
export type { MerkleNode, MerkleTree } from "./types.js";
