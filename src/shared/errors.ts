export class StoreNotFoundError extends Error {
  readonly path: string;

  constructor(storePath: string) {
    super(`Firefox store not found at ${storePath}`);
    this.name = 'StoreNotFoundError';
    this.path = storePath;
  }
}

/** A store file exists but its bytes could not be loaded. */
export class StoreReadError extends Error {
  readonly path: string;

  constructor(storePath: string, cause: unknown) {
    super(`Cannot read Firefox store at ${storePath}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = 'StoreReadError';
    this.path = storePath;
  }
}
