export type DependencyName = "durableStore" | "cache" | "generation" | "auxiliaryContext";

export interface ValidationIssue {
  path: string;
  message: string;
}

/** Malformed caller input. The only error the suggestion flow lets through. */
export class ValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = "ValidationError";
    this.issues = issues;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DependencyUnavailableError extends Error {
  readonly dependency: DependencyName;

  constructor(dependency: DependencyName, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DependencyUnavailableError";
    this.dependency = dependency;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DependencyTimeoutError extends DependencyUnavailableError {
  readonly timeoutMs: number;

  constructor(dependency: DependencyName, timeoutMs: number) {
    super(dependency, `${dependency} call timed out after ${timeoutMs}ms`);
    this.name = "DependencyTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Backend answered, but with an error or a payload we cannot use. */
export class GenerationFailureError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "GenerationFailureError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class StoreFailureError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StoreFailureError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
