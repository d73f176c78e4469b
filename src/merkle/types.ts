export interface MerkleNode {
  readonly hash: string;
  readonly left?: MerkleNode;
  readonly right?: MerkleNode;
  readonly isLeaf: boolean;
}

export interface MerkleTree {
  readonly root: MerkleNode;
  readonly rootHash: string;
  readonly depth: number;
  readonly leafCount: number;
}
