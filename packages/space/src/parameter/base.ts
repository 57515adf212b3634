import { SearchSpaceDefinitionError, UnsupportedOperationError } from "@paramspace/common";
import type { ParameterKind, ParameterType, ParameterValue } from "../types";
import { castValue, formatValue, isNumericType, isValidValueType, matchesValueType } from "../values";

/** Value → names of the parameters that become applicable when it is taken. */
export type Dependents = ReadonlyMap<ParameterValue, readonly string[]>;

export interface BaseParameterOptions {
	isFidelity?: boolean;
	targetValue?: ParameterValue;
	dependents?: Dependents;
}

/**
 * One row of a search space summary.
 */
export interface ParameterSummary {
	name: string;
	type: "Range" | "Choice" | "Fixed";
	domain: string;
	datatype: ParameterType;
	flags: string;
	targetValue: ParameterValue | undefined;
	dependents: Record<string, readonly string[]> | undefined;
}

/**
 * Shared behavior of every parameter variant. Concrete variants carry a
 * `kind` tag so callers can switch over the closed union instead of
 * inspecting classes.
 */
export abstract class BaseParameter {
	abstract readonly kind: ParameterKind;

	readonly name: string;
	readonly parameterType: ParameterType;
	readonly isFidelity: boolean;
	readonly targetValue: ParameterValue | undefined;
	protected readonly _dependents: Dependents | undefined;

	protected constructor(name: string, parameterType: ParameterType, options: BaseParameterOptions) {
		if (name.length === 0) {
			throw new SearchSpaceDefinitionError("Parameter name must be a non-empty string.");
		}
		this.name = name;
		this.parameterType = parameterType;
		this.isFidelity = options.isFidelity ?? false;
		this.targetValue = options.targetValue ?? undefined;
		if (this.isFidelity && this.targetValue === undefined) {
			throw new SearchSpaceDefinitionError(
				`Parameter \`${name}\` is a fidelity parameter and needs a target value.`,
				[name],
			);
		}
		this._dependents = options.dependents ? copyDependents(name, options.dependents) : undefined;
	}

	get isNumeric(): boolean {
		return isNumericType(this.parameterType);
	}

	get isHierarchical(): boolean {
		return this._dependents !== undefined;
	}

	/**
	 * @throws {UnsupportedOperationError} on non-hierarchical parameters
	 */
	get dependents(): Dependents {
		if (!this._dependents) {
			throw new UnsupportedOperationError(
				`Only hierarchical parameters support the \`dependents\` property; \`${this.name}\` is not hierarchical.`,
				"dependents",
			);
		}
		return this._dependents;
	}

	/** Permissive runtime type check (ints and floats interchangeable). */
	isValidType(value: ParameterValue): boolean {
		return isValidValueType(this.parameterType, value);
	}

	/** Exact runtime type check against the declared value type. */
	matchesValueType(value: ParameterValue): boolean {
		return matchesValueType(this.parameterType, value);
	}

	cast(value: ParameterValue): ParameterValue {
		return castValue(this.parameterType, value);
	}

	/** Whether `value` is in this parameter's domain. */
	abstract validate(value: ParameterValue): boolean;

	/** Short description of the domain, e.g. "range=[0, 1]". */
	abstract get domainRepr(): string;

	protected abstract get summaryType(): ParameterSummary["type"];

	protected get flags(): string[] {
		return this.isFidelity ? ["fidelity"] : [];
	}

	/** Validate that every dependents key is a value of this parameter. */
	protected checkDependentsKeys(): void {
		if (!this._dependents) return;
		for (const value of this._dependents.keys()) {
			if (!this.validate(value)) {
				throw new SearchSpaceDefinitionError(
					`Dependents of parameter \`${this.name}\` are keyed by ${formatValue(value)}, which is not a valid value of the parameter.`,
					[this.name],
				);
			}
		}
	}

	summary(): ParameterSummary {
		return {
			name: this.name,
			type: this.summaryType,
			domain: this.domainRepr,
			datatype: this.parameterType,
			flags: this.flags.join(", "),
			targetValue: this.targetValue,
			dependents: this._dependents
				? Object.fromEntries([...this._dependents].map(([value, names]) => [String(value), names]))
				: undefined,
		};
	}

	/** Structural equality: same variant, name, type, domain, flags and dependents. */
	equals(other: BaseParameter): boolean {
		return this.kind === other.kind && this.toString() === other.toString();
	}

	toString(): string {
		const extras: string[] = [];
		if (this.isFidelity) extras.push("fidelity=true");
		if (this.targetValue !== undefined) extras.push(`target_value=${formatValue(this.targetValue)}`);
		if (this._dependents) {
			const entries = [...this._dependents].map(
				([value, names]) => `${formatValue(value)}: [${names.map((n) => `'${n}'`).join(", ")}]`,
			);
			extras.push(`dependents={${entries.join(", ")}}`);
		}
		const head = `${this.summaryType}Parameter(name='${this.name}', parameter_type=${this.parameterType.toUpperCase()}, ${this.domainRepr}`;
		return `${[head, ...extras].join(", ")})`;
	}
}

function copyDependents(name: string, dependents: Dependents): Dependents {
	if (dependents.size === 0) {
		throw new SearchSpaceDefinitionError(`Parameter \`${name}\` declares an empty dependents mapping.`, [name]);
	}
	const copy = new Map<ParameterValue, readonly string[]>();
	for (const [value, names] of dependents) {
		if (names.length === 0) {
			throw new SearchSpaceDefinitionError(
				`Parameter \`${name}\` lists no dependents under value ${formatValue(value)}.`,
				[name],
			);
		}
		copy.set(value, [...names]);
	}
	return copy;
}
