export interface CommandResult {
  readonly output: string;
  readonly verdict: string;
  readonly exitCode: number;
}

export interface RepoOptions {
  readonly root?: string;
  readonly config?: string;
}
