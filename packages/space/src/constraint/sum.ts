import { SearchSpaceDefinitionError } from "@paramspace/common";
import type { Parameter } from "../parameter";
import { ParameterConstraint } from "./linear";
import { requireNumeric, type ParameterLookup } from "./validation";

/**
 * Sum of parameters bounded above (`<= bound`) or below (`>= bound`).
 */
export class SumConstraint extends ParameterConstraint {
	private _parameters: Parameter[];
	readonly isUpperBound: boolean;

	constructor(parameters: readonly Parameter[], isUpperBound: boolean, bound: number) {
		requireNumeric(parameters);
		const names = parameters.map((p) => p.name);
		if (new Set(names).size !== names.length) {
			throw new SearchSpaceDefinitionError("Sum constraint parameters must be unique.", names);
		}
		const sign = isUpperBound ? 1 : -1;
		super(Object.fromEntries(names.map((name) => [name, sign])), sign * bound);
		this._parameters = [...parameters];
		this.isUpperBound = isUpperBound;
	}

	get parameters(): Parameter[] {
		return [...this._parameters];
	}

	/** The bound as declared, before sign normalization. */
	get sumBound(): number {
		return this.isUpperBound ? this._bound : -this._bound;
	}

	/** Point every summand at the instance `lookup` returns for its name. */
	rebind(lookup: ParameterLookup): void {
		this._parameters = this._parameters.map((parameter) => lookup(parameter.name));
	}

	override clone(): SumConstraint {
		return new SumConstraint(
			this._parameters.map((p) => p.clone()),
			this.isUpperBound,
			this.sumBound,
		);
	}

	override toString(): string {
		const op = this.isUpperBound ? "<=" : ">=";
		return `SumConstraint(${this._parameters.map((p) => p.name).join(" + ")} ${op} ${this.sumBound})`;
	}
}
