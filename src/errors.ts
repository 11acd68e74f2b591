/**
 * A registry mutation was applied in memory but could not be written to
 * the allow-list file. The file stays stale until the next successful save.
 */
export class PersistenceError extends Error {
  constructor(readonly location: string, cause: unknown) {
    super(`cannot write ${location}: ${errorMessage(cause)}`, { cause });
    this.name = "PersistenceError";
  }
}

export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function isNotFound(err: unknown): boolean {
  return errorCode(err) === "ENOENT";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
