/**
 * Core value types shared across the search space package.
 */

/** Declared value type of a parameter. */
export type ParameterType = "int" | "float" | "string" | "bool";

/** Closed set of parameter variants. */
export type ParameterKind = "range" | "choice" | "fixed";

/** A single parameter value; `null` means unset. */
export type ParameterValue = number | string | boolean | null;

/** Mapping from parameter name to value: one candidate point. */
export type Parameterization = Record<string, ParameterValue>;

/** Source of uniform draws in [0, 1). Injected for deterministic sampling. */
export type RandomSource = () => number;
