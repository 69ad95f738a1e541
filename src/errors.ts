/** Bad command-line flags or configuration values */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** The input produced nothing to render */
export class EmptyInputError extends Error {
  constructor(message = 'No values to render') {
    super(message);
    this.name = 'EmptyInputError';
  }
}
