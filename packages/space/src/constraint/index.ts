import { OrderConstraint } from "./order";
import { SumConstraint } from "./sum";

export { ParameterConstraint } from "./linear";
export { OrderConstraint } from "./order";
export { SumConstraint } from "./sum";
export type { ParameterLookup } from "./validation";

/** Constraints that hold parameter objects rather than only names. */
export type BoundConstraint = OrderConstraint | SumConstraint;

export function isBoundConstraint(value: unknown): value is BoundConstraint {
	return value instanceof OrderConstraint || value instanceof SumConstraint;
}
