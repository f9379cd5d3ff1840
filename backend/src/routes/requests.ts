import { ValidationError } from '../middleware/errorHandler.js';

/** Fields of a JSON object body; anything else is rejected */
export function bodyFields(body: unknown): Map<string, unknown> {
  if (!body || typeof body !== 'object' || Array.isArray(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return new Map(Object.entries(body));
}

export function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function optionalNumeric(value: unknown): number | string | undefined {
  return typeof value === 'number' || typeof value === 'string' ? value : undefined;
}

export function requireNumeric(fields: Map<string, unknown>, key: string): number | string {
  const value = optionalNumeric(fields.get(key));
  if (value === undefined) {
    throw new ValidationError(`${key} is required`, { field: key });
  }
  return value;
}
