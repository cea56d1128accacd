import type { FieldError } from '../services/cfp-policy.js';

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class CfpValidationError extends Error {
  readonly errors: FieldError[];

  constructor(errors: FieldError[]) {
    super(`Cfp is invalid: ${errors.map((e) => `${e.field} ${e.reason}`).join(', ')}`);
    this.name = 'CfpValidationError';
    this.errors = errors;
  }
}

export function is_unique_violation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === '23505';
}
