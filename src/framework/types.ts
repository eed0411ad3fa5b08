/**
 * Core types shared by every component
 */

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Receives non-fatal validation messages. The core never prints;
 * callers that want warnings on the console pass one in.
 */
export type WarningHandler = (message: string) => void;

/**
 * Range constraint for numeric settings
 */
export interface Range {
  min?: number;
  max?: number;
  default: number;
}

/**
 * Setting metadata for documentation and introspection
 */
export interface ParamMeta {
  description: string;
  unit: string;
  range: Range;
  source?: string;  // Academic source
}
