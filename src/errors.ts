export class DeclarationError extends Error {
  override readonly name = 'DeclarationError';

  constructor(
    readonly entityName: string,
    message: string,
  ) {
    super(`${entityName}: ${message}`);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface UnitFailure {
  entityName: string;
  error: unknown;
}

export class GenerationError extends Error {
  override readonly name = 'GenerationError';

  constructor(
    readonly failures: readonly UnitFailure[],
    message?: string,
  ) {
    super(
      message ??
        `Search generation failed for ${failures.length} entit${failures.length === 1 ? 'y' : 'ies'}: ` +
          failures.map((f) => f.entityName).join(', '),
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class SqlCompileError extends Error {
  override readonly name = 'SqlCompileError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class PredicateEvaluationError extends Error {
  override readonly name = 'PredicateEvaluationError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class SearchExecutionError extends Error {
  override readonly name = 'SearchExecutionError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
