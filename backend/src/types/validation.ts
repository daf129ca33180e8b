export interface ValidationResult {
  isValid: boolean;
  error?: string;
}

export type ParseResult<T> =
  | { isValid: true; value: T }
  | { isValid: false; error: string };
