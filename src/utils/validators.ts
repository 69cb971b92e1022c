import { URL } from 'node:url';
import { ValidationError, ValidationErrors } from '../domain/errors';

const EMAIL_REGEX = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export const isValidEmail = (value: string): boolean => EMAIL_REGEX.test(value.toLowerCase());

export const isValidPositiveInteger = (value: string): boolean => /^\d+$/.test(value) && Number(value) > 0;

export const parsePositiveInteger = (value: unknown): number | undefined => {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value > 0 ? value : undefined;
  }
  if (typeof value !== 'string' || !isValidPositiveInteger(value.trim())) {
    return undefined;
  }
  return Number(value.trim());
};

export const isValidHttpUrl = (value: string): boolean => {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch (error) {
    return false;
  }
};

export const assertValidHttpUrl = (value: string, fieldName: string): void => {
  if (!isValidHttpUrl(value)) {
    throw new Error(`The ${fieldName} value must be a valid HTTP/HTTPS URL.`);
  }
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value);

export interface FieldRules {
  required?: boolean;
  sometimes?: boolean;
  email?: boolean;
  max?: number;
}

const label = (field: string): string => field.replace(/_/g, ' ');

const checkField = (field: string, value: unknown, rules: FieldRules): string[] => {
  const missing = value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
  if (missing) {
    return rules.required ? [`The ${label(field)} field is required.`] : [];
  }
  if (typeof value !== 'string') {
    return [`The ${label(field)} field must be a string.`];
  }

  const messages: string[] = [];
  if (rules.email && !isValidEmail(value)) {
    messages.push(`The ${label(field)} field must be a valid email address.`);
  }
  if (rules.max !== undefined && value.length > rules.max) {
    messages.push(`The ${label(field)} field must not be greater than ${rules.max} characters.`);
  }
  return messages;
};

/**
 * Validates the string fields of a request body. Fields marked `sometimes`
 * are only checked when present. Throws `ValidationError` listing every
 * failing field.
 */
export const validatePayload = <K extends string>(
  payload: unknown,
  schema: Record<K, FieldRules>
): Partial<Record<K, string>> => {
  const body: Record<string, unknown> = isRecord(payload) ? payload : {};
  const errors: ValidationErrors = {};
  const validated: Partial<Record<K, string>> = {};

  for (const field in schema) {
    const rules = schema[field];
    const present = Object.prototype.hasOwnProperty.call(body, field);
    if (rules.sometimes && !present) {
      continue;
    }
    const value = body[field];
    const messages = checkField(field, value, rules);
    if (messages.length) {
      errors[field] = messages;
    } else if (typeof value === 'string') {
      validated[field] = value;
    }
  }

  if (Object.keys(errors).length) {
    throw new ValidationError(errors);
  }
  return validated;
};
