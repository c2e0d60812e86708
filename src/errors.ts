export class ArborError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

// Bad command line: unknown option, missing value, malformed number
export class UsageError extends ArborError {
  constructor(message: string) {
    super(message, 2);
  }
}

export class NotARepositoryError extends ArborError {
  constructor() {
    super('not a git repository (or any parent directory)', 1);
  }
}
