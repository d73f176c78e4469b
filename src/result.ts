export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function toError(error: unknown, fallback: string): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(typeof error === "string" ? error : fallback);
}
