import { ValidationError } from './errors.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads loosely-typed JSON into typed values. The failure callback decides
 * which error a bad value turns into (request validation vs. bad data file).
 */
export class FieldReader {
  constructor(private readonly fail: (message: string) => never) {}

  record(value: unknown, where: string): Record<string, unknown> {
    if (!isRecord(value)) {
      return this.fail(`${where} must be an object`);
    }
    return value;
  }

  array(value: unknown, where: string): unknown[] {
    if (!Array.isArray(value)) {
      return this.fail(`${where} must be an array`);
    }
    return value;
  }

  string(value: unknown, where: string): string {
    if (typeof value !== 'string') {
      return this.fail(`${where} must be a string`);
    }
    return value;
  }

  optionalString(value: unknown, where: string): string | undefined {
    return value === undefined || value === null ? undefined : this.string(value, where);
  }

  number(value: unknown, where: string): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      return this.fail(`${where} must be a number`);
    }
    return value;
  }

  optionalNumber(value: unknown, where: string): number | undefined {
    return value === undefined || value === null ? undefined : this.number(value, where);
  }

  integer(value: unknown, where: string, min: number, max: number): number {
    const n = this.number(value, where);
    if (!Number.isInteger(n) || n < min || n > max) {
      return this.fail(`${where} must be an integer between ${min} and ${max}`);
    }
    return n;
  }

  optionalBoolean(value: unknown, where: string): boolean | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'boolean') {
      return this.fail(`${where} must be a boolean`);
    }
    return value;
  }

  stringArray(value: unknown, where: string): string[] {
    return this.array(value, where).map((item, i) => this.string(item, `${where}[${i}]`));
  }

  /** Missing lists read as empty. */
  optionalStringArray(value: unknown, where: string): string[] {
    return value === undefined || value === null ? [] : this.stringArray(value, where);
  }

  numberArray(value: unknown, where: string): number[] {
    return this.array(value, where).map((item, i) => this.number(item, `${where}[${i}]`));
  }

  oneOf<T extends string>(value: unknown, allowed: readonly T[], where: string): T {
    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
      return this.fail(`${where} must be one of ${allowed.join(', ')}`);
    }
    return match;
  }
}

export const requestReader = new FieldReader((message) => {
  throw new ValidationError(message);
});
