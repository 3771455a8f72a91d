/**
 * Input Validation Utilities
 * Validates data before it reaches the stores
 */

export class ValidationError extends Error {
  constructor(
    message: string,
    public field?: string,
    public value?: unknown
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Validate required string fields are present and not blank
 */
export function validateRequired<T extends Record<string, unknown>>(
  data: T,
  requiredFields: (keyof T)[]
): void {
  for (const field of requiredFields) {
    const value = data[field];
    if (value === undefined || value === null || (typeof value === 'string' && value.trim() === '')) {
      throw new ValidationError(`Missing required field: ${String(field)}`, String(field));
    }
  }
}

/**
 * Validate positive integer (quantities, ids)
 */
export function validatePositiveInteger(value: number, fieldName: string): void {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${fieldName} must be a positive integer`, fieldName, value);
  }
}

/**
 * Validate price in minor currency units: integer, zero allowed
 */
export function validatePrice(price: number, fieldName: string): void {
  if (typeof price !== 'number' || !Number.isInteger(price) || price < 0) {
    throw new ValidationError(`${fieldName} must be a non-negative integer`, fieldName, price);
  }
}

/**
 * Validate enum value
 */
export function validateEnum<T extends Record<string, string>>(
  value: string,
  enumType: T,
  fieldName: string
): asserts value is T[keyof T] {
  const validValues: string[] = Object.values(enumType);
  if (!validValues.includes(value)) {
    throw new ValidationError(`${fieldName} must be one of: ${validValues.join(', ')}`, fieldName, value);
  }
}

/**
 * True when the text holds a run of at least `minDigits` digits
 */
export function containsDigitRun(value: string, minDigits: number): boolean {
  return new RegExp(`\\d{${minDigits},}`).test(value);
}

/**
 * Sanitize string input
 */
export function sanitizeString(input: string): string {
  if (typeof input !== 'string') {
    return '';
  }

  return input
    .replace(/[\x00-\x09\x0B-\x1F\x7F]/g, '') // Control characters except newline
    .trim();
}
