// src/utils/validation.ts
import { InvalidPatentNumberError } from './errors';

const MIN_PATENT_NUMBER_LENGTH = 3;

export class Validators {
  /**
   * Minimal well-formedness check. No office-specific number grammar is applied.
   */
  static isValidPatentNumber(value: unknown): value is string {
    return typeof value === 'string' && value.trim().length >= MIN_PATENT_NUMBER_LENGTH;
  }
}

export function validatePatentNumber(value: unknown): asserts value is string {
  if (Validators.isValidPatentNumber(value)) {
    return;
  }

  if (typeof value !== 'string' || value.length === 0) {
    throw new InvalidPatentNumberError('Patent number must be a non-empty string');
  }

  throw new InvalidPatentNumberError('Patent number too short');
}
