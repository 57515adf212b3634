import { SearchSpaceDefinitionError } from "@paramspace/common";
import type { ParameterType, ParameterValue } from "../types";
import { formatValue } from "../values";
import { BaseParameter, type Dependents, type ParameterSummary } from "./base";

export interface FixedParameterOptions {
	name: string;
	parameterType: ParameterType;
	value: Exclude<ParameterValue, null>;
	isFidelity?: boolean;
	targetValue?: Exclude<ParameterValue, null>;
	dependents?: Dependents;
}

/**
 * Parameter pinned to a single value. Not tunable; may be hierarchical.
 */
export class FixedParameter extends BaseParameter {
	readonly kind = "fixed" as const;
	readonly value: Exclude<ParameterValue, null>;

	constructor(options: FixedParameterOptions) {
		super(options.name, options.parameterType, {
			isFidelity: options.isFidelity,
			targetValue: options.targetValue,
			dependents: options.dependents,
		});
		if (!this.isValidType(options.value)) {
			throw new SearchSpaceDefinitionError(
				`Value ${formatValue(options.value)} of fixed parameter \`${options.name}\` is not of type ${options.parameterType}.`,
				[options.name],
			);
		}
		this.value = options.value;
		this.checkDependentsKeys();
	}

	validate(value: ParameterValue): boolean {
		return value === this.value;
	}

	get domainRepr(): string {
		return `value=${formatValue(this.value)}`;
	}

	protected get summaryType(): ParameterSummary["type"] {
		return "Fixed";
	}

	clone(): FixedParameter {
		return new FixedParameter({
			name: this.name,
			parameterType: this.parameterType,
			value: this.value,
			isFidelity: this.isFidelity,
			targetValue: this.targetValue ?? undefined,
			dependents: this._dependents,
		});
	}
}
