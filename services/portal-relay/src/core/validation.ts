import { ValidationError } from './errors.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

export function formatLocalDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * Accepts `YYYY-MM-DD` naming a real calendar day. An absent or blank value
 * means today.
 */
export function parseReportDate(input: unknown, today: Date = new Date()): string {
  if (input === undefined || input === null) return formatLocalDate(today);
  if (typeof input !== 'string') {
    throw new ValidationError('report_date must be a string in YYYY-MM-DD format');
  }

  const value = input.trim();
  if (value.length === 0) return formatLocalDate(today);

  const match = DATE_PATTERN.exec(value);
  if (!match) {
    throw new ValidationError('Invalid date format. Use YYYY-MM-DD', { report_date: value });
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const candidate = new Date(Date.UTC(year, month - 1, day));
  if (
    candidate.getUTCFullYear() !== year ||
    candidate.getUTCMonth() !== month - 1 ||
    candidate.getUTCDate() !== day
  ) {
    throw new ValidationError('Invalid date. No such calendar day', { report_date: value });
  }

  return value;
}

export function parseSourceUrl(input: unknown, field: string): URL {
  if (typeof input !== 'string' || input.trim().length === 0) {
    throw new ValidationError(`${field} is required and must be a non-empty string`);
  }

  let url: URL;
  try {
    url = new URL(input.trim());
  } catch {
    throw new ValidationError(`${field} must be an absolute URL`, { [field]: input });
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ValidationError(`${field} must use http or https`, { [field]: input });
  }

  return url;
}

export function requiredString(input: unknown, field: string): string {
  if (typeof input !== 'string' || input.trim().length === 0) {
    throw new ValidationError(`${field} is required and must be a non-empty string`);
  }
  return input.trim();
}

export function optionalString(input: unknown): string | undefined {
  if (typeof input !== 'string') return undefined;
  const value = input.trim();
  return value.length > 0 ? value : undefined;
}
