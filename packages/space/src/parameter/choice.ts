import { SearchSpaceDefinitionError } from "@paramspace/common";
import type { ParameterType, ParameterValue } from "../types";
import { formatValue, isValidValueType } from "../values";
import { BaseParameter, type Dependents, type ParameterSummary } from "./base";

export interface ChoiceParameterOptions {
	name: string;
	parameterType: ParameterType;
	values: readonly Exclude<ParameterValue, null>[];
	/** Defaults to true for numeric and bool parameters, false for strings. */
	isOrdered?: boolean;
	isTask?: boolean;
	/** Sort values ascending. Defaults to `isOrdered` for numeric parameters. */
	sortValues?: boolean;
	isFidelity?: boolean;
	targetValue?: Exclude<ParameterValue, null>;
	dependents?: Dependents;
}

/**
 * Parameter taking one of an explicit list of values. May be hierarchical.
 */
export class ChoiceParameter extends BaseParameter {
	readonly kind = "choice" as const;
	readonly values: readonly Exclude<ParameterValue, null>[];
	readonly isOrdered: boolean;
	readonly isTask: boolean;
	readonly sortValues: boolean;

	constructor(options: ChoiceParameterOptions) {
		super(options.name, options.parameterType, {
			isFidelity: options.isFidelity,
			targetValue: options.targetValue,
			dependents: options.dependents,
		});
		const { name, parameterType } = options;
		const numeric = parameterType === "int" || parameterType === "float";
		this.isOrdered = options.isOrdered ?? parameterType !== "string";
		this.isTask = options.isTask ?? false;
		this.sortValues = options.sortValues ?? (this.isOrdered && numeric);

		if (options.values.length < 2) {
			throw new SearchSpaceDefinitionError(
				`Choice parameter \`${name}\` needs at least two values; use a fixed parameter for a single value.`,
				[name],
			);
		}
		for (const value of options.values) {
			if (!isValidValueType(parameterType, value)) {
				throw new SearchSpaceDefinitionError(
					`Value ${formatValue(value)} of choice parameter \`${name}\` is not of type ${parameterType}.`,
					[name],
				);
			}
		}
		if (new Set(options.values).size !== options.values.length) {
			throw new SearchSpaceDefinitionError(`Values of choice parameter \`${name}\` must be unique.`, [name]);
		}
		if (this.sortValues && !numeric) {
			throw new SearchSpaceDefinitionError(`Only numeric choice parameters can sort values; \`${name}\` is ${parameterType}.`, [name]);
		}
		if (this.isTask && this.targetValue === undefined) {
			throw new SearchSpaceDefinitionError(`Task parameter \`${name}\` needs a target value.`, [name]);
		}

		const values = [...options.values];
		this.values = this.sortValues ? values.sort((a, b) => Number(a) - Number(b)) : values;

		if (this.targetValue !== undefined && !this.validate(this.targetValue)) {
			throw new SearchSpaceDefinitionError(
				`Target value ${formatValue(this.targetValue)} of parameter \`${name}\` is not one of its values.`,
				[name],
			);
		}
		this.checkDependentsKeys();
	}

	validate(value: ParameterValue): boolean {
		if (value === null || !this.isValidType(value)) {
			return false;
		}
		return this.values.includes(value);
	}

	get domainRepr(): string {
		return `values=[${this.values.map(formatValue).join(", ")}]`;
	}

	protected get summaryType(): ParameterSummary["type"] {
		return "Choice";
	}

	protected override get flags(): string[] {
		const flags = super.flags;
		flags.push(this.isOrdered ? "ordered" : "unordered");
		if (this.isTask) flags.push("task");
		if (this.sortValues) flags.push("sorted");
		return flags;
	}

	override toString(): string {
		const base = super.toString();
		return `${base.slice(0, -1)}, is_ordered=${this.isOrdered}, sort_values=${this.sortValues})`;
	}

	clone(): ChoiceParameter {
		return new ChoiceParameter({
			name: this.name,
			parameterType: this.parameterType,
			values: this.values,
			isOrdered: this.isOrdered,
			isTask: this.isTask,
			sortValues: this.sortValues,
			isFidelity: this.isFidelity,
			targetValue: this.targetValue ?? undefined,
			dependents: this._dependents,
		});
	}
}
