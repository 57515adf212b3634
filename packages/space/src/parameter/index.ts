import { ChoiceParameter } from "./choice";
import { FixedParameter } from "./fixed";
import { RangeParameter } from "./range";

export { BaseParameter, type Dependents, type ParameterSummary } from "./base";
export { ChoiceParameter, type ChoiceParameterOptions } from "./choice";
export { FixedParameter, type FixedParameterOptions } from "./fixed";
export { RangeParameter, type RangeParameterOptions } from "./range";

/** Closed union of parameter variants, discriminated by `kind`. */
export type Parameter = RangeParameter | ChoiceParameter | FixedParameter;

export function isParameter(value: unknown): value is Parameter {
	return value instanceof RangeParameter || value instanceof ChoiceParameter || value instanceof FixedParameter;
}
