/**
 * Numeric tolerances shared by parameters, constraints and casting.
 */

/** Slack allowed when comparing a value against range bounds or a constraint bound. */
export const NUMERIC_TOLERANCE = 1e-8;

/** Largest distance from an integer at which a float still counts as an int. */
export const INT_TOLERANCE = 1e-8;
