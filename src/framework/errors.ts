/**
 * Error kinds
 *
 * Every failure is raised synchronously at the point of use. Nothing is
 * clamped, corrected or retried: a bad radiative efficiency or lifetime is
 * an upstream data error and must surface as one.
 */

/**
 * Malformed gas parameters, non-positive horizon, bad sample count or
 * invalid settings.
 */
export class InvalidInputError extends Error {
  readonly kind = 'InvalidInput' as const;

  /**
   * @param component - Component name, rendered as a `[component]` prefix
   * @param problems - One or more problems; several are listed one per line
   */
  constructor(
    readonly component: string,
    readonly problems: readonly string[]
  ) {
    super(
      problems.length === 1
        ? `[${component}] ${problems[0]}`
        : `[${component}] Invalid input:\n  ${problems.join('\n  ')}`
    );
    this.name = 'InvalidInputError';
  }
}

/**
 * Reference AGWP evaluated to zero, so the GWP ratio has no value.
 */
export class DivisionUndefinedError extends Error {
  readonly kind = 'DivisionUndefined' as const;

  constructor(
    readonly referenceId: string,
    readonly horizon: number
  ) {
    super(
      `[gwp-calculator] AGWP of reference '${referenceId}' is zero at horizon ${horizon}; GWP undefined`
    );
    this.name = 'DivisionUndefinedError';
  }
}

export type GwpError = InvalidInputError | DivisionUndefinedError;

export type GwpErrorKind = GwpError['kind'];

export function isGwpError(value: unknown): value is GwpError {
  return value instanceof InvalidInputError || value instanceof DivisionUndefinedError;
}
