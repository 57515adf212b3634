import { ParameterValueError, SearchSpaceDefinitionError } from "@paramspace/common";
import { NUMERIC_TOLERANCE } from "../constants";

/**
 * Linear inequality `sum(coefficient * value) <= bound` over numeric parameters.
 */
export class ParameterConstraint {
	protected _constraintDict: Record<string, number>;
	protected _bound: number;

	constructor(constraintDict: Record<string, number>, bound: number) {
		const names = Object.keys(constraintDict);
		if (names.length === 0) {
			throw new SearchSpaceDefinitionError("Parameter constraint must reference at least one parameter.");
		}
		for (const [name, coefficient] of Object.entries(constraintDict)) {
			if (!Number.isFinite(coefficient)) {
				throw new SearchSpaceDefinitionError(`Coefficient of \`${name}\` must be finite.`, [name]);
			}
		}
		if (!Number.isFinite(bound)) {
			throw new SearchSpaceDefinitionError("Parameter constraint bound must be finite.", names);
		}
		this._constraintDict = { ...constraintDict };
		this._bound = bound;
	}

	get constraintDict(): Readonly<Record<string, number>> {
		return this._constraintDict;
	}

	get bound(): number {
		return this._bound;
	}

	get parameterNames(): string[] {
		return Object.keys(this._constraintDict);
	}

	/**
	 * Whether the numeric values satisfy the constraint.
	 *
	 * @throws {ParameterValueError} if a referenced parameter has no value
	 */
	check(values: Readonly<Record<string, number>>): boolean {
		let weightedSum = 0;
		for (const [name, coefficient] of Object.entries(this._constraintDict)) {
			const value = values[name];
			if (value === undefined) {
				throw new ParameterValueError(`\`${name}\` not present in the values to check.`, name);
			}
			weightedSum += coefficient * value;
		}
		return weightedSum <= this._bound + NUMERIC_TOLERANCE;
	}

	clone(): ParameterConstraint {
		return new ParameterConstraint(this._constraintDict, this._bound);
	}

	equals(other: ParameterConstraint): boolean {
		return this.toString() === other.toString();
	}

	toString(): string {
		const terms = Object.entries(this._constraintDict).map(([name, coefficient]) => `${coefficient}*${name}`);
		return `ParameterConstraint(${terms.join(" + ")} <= ${this._bound})`;
	}
}
