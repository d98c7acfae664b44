export class GitsiftError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnknownSourceError extends GitsiftError {
  constructor(readonly sourceName: string) {
    super(`Unknown source: ${sourceName}`);
  }
}

export class UnknownActionError extends GitsiftError {
  constructor(
    readonly kindName: string,
    readonly actionName: string
  ) {
    super(`Action "${actionName}" is not defined for ${kindName}`);
  }
}

export class NotARepositoryError extends GitsiftError {
  constructor(readonly cwd: string) {
    super(`Not a git repository: ${cwd}`);
  }
}

/** Extracts a printable message from anything a promise may reject with. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message.trim();
  return String(err);
}
