/**
 * Validate-on-Construct Pattern
 *
 * Settings and gas parameters are validated when they are built,
 * so invalid values never exist downstream.
 */

import { ValidationResult, WarningHandler } from './types.js';
import { InvalidInputError } from './errors.js';

/**
 * Wraps a merge + validate into a single operation.
 * Throws InvalidInputError on validation errors; warnings go to `onWarning`.
 *
 * @param component - Component name for error messages
 * @param validateFn - Validation function for the merged value
 * @param mergeFn - Function that merges partial input with defaults
 * @param partial - Partial input to merge
 * @param onWarning - Optional receiver for non-fatal warnings
 * @returns Fully merged and validated value
 */
export function validatedMerge<TParams, TPartial = Partial<TParams>>(
  component: string,
  validateFn: (params: TParams) => ValidationResult,
  mergeFn: (partial: TPartial) => TParams,
  partial: TPartial,
  onWarning?: WarningHandler
): TParams {
  const merged = mergeFn(partial);

  const result = validateFn(merged);

  if (onWarning) {
    for (const warning of result.warnings) {
      onWarning(`[${component}] Warning: ${warning}`);
    }
  }

  if (!result.valid) {
    throw new InvalidInputError(component, result.errors);
  }

  return merged;
}
