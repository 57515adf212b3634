import { SearchSpaceDefinitionError } from "@paramspace/common";
import type { Parameter } from "../parameter";
import { ParameterConstraint } from "./linear";
import { requireNumeric, type ParameterLookup } from "./validation";

/**
 * `lower <= upper` between two numeric parameters.
 */
export class OrderConstraint extends ParameterConstraint {
	private _lowerParameter: Parameter;
	private _upperParameter: Parameter;

	constructor(lowerParameter: Parameter, upperParameter: Parameter) {
		requireNumeric([lowerParameter, upperParameter]);
		if (lowerParameter.name === upperParameter.name) {
			throw new SearchSpaceDefinitionError(
				`Order constraint needs two distinct parameters; got \`${lowerParameter.name}\` twice.`,
				[lowerParameter.name],
			);
		}
		super({ [lowerParameter.name]: 1, [upperParameter.name]: -1 }, 0);
		this._lowerParameter = lowerParameter;
		this._upperParameter = upperParameter;
	}

	get lowerParameter(): Parameter {
		return this._lowerParameter;
	}

	get upperParameter(): Parameter {
		return this._upperParameter;
	}

	get parameters(): Parameter[] {
		return [this._lowerParameter, this._upperParameter];
	}

	/** Point both sides at the instances `lookup` returns for their names. */
	rebind(lookup: ParameterLookup): void {
		this._lowerParameter = lookup(this._lowerParameter.name);
		this._upperParameter = lookup(this._upperParameter.name);
	}

	override clone(): OrderConstraint {
		return new OrderConstraint(this._lowerParameter.clone(), this._upperParameter.clone());
	}

	override toString(): string {
		return `OrderConstraint(${this._lowerParameter.name} <= ${this._upperParameter.name})`;
	}
}
