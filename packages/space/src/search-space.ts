import {
	ConstraintViolationError,
	ParameterizationTypeError,
	ParameterValueError,
	SearchSpaceDefinitionError,
} from "@paramspace/common";
import { Arm } from "./arm";
import { isBoundConstraint, type ParameterConstraint } from "./constraint";
import type { ChoiceParameter, FixedParameter, Parameter, ParameterSummary, RangeParameter } from "./parameter";
import type { ParameterValue, Parameterization } from "./types";
import { formatValue, valueTypeOf } from "./values";

export interface MembershipOptions {
	/** Throw a descriptive error instead of returning false. */
	raiseError?: boolean;
	/** Require a value for every parameter (default true). */
	checkAllParametersPresent?: boolean;
}

export interface TypeCheckOptions {
	/** Treat `null` as valid for any parameter (default true). */
	allowNone?: boolean;
	/** Ignore names the space does not declare (default true). */
	allowExtraParams?: boolean;
	raiseError?: boolean;
}

const SUMMARY_COLUMNS = [
	["name", "Name"],
	["type", "Type"],
	["domain", "Domain"],
	["datatype", "Datatype"],
	["flags", "Flags"],
	["targetValue", "Target Value"],
	["dependents", "Dependent Parameters"],
] as const satisfies ReadonlyArray<readonly [keyof ParameterSummary, string]>;

/**
 * A uniquely named set of parameters and the linear constraints over them.
 *
 * The space owns its parameter instances: constraints that hold parameter
 * objects are rebound to those instances whenever they are assigned.
 *
 * @example
 * ```ts
 * const space = new SearchSpace(
 *   [x1, x2],
 *   [new SumConstraint([x1, x2], true, 1)],
 * );
 * space.checkMembership({ x1: 0.4, x2: 0.4 }); // true
 * ```
 */
export class SearchSpace {
	protected readonly _parameters: Map<string, Parameter>;
	protected _parameterConstraints: ParameterConstraint[] = [];

	constructor(parameters: readonly Parameter[], parameterConstraints: readonly ParameterConstraint[] = []) {
		const names = parameters.map((p) => p.name);
		if (new Set(names).size < names.length) {
			const duplicates = names.filter((name, i) => names.indexOf(name) !== i);
			throw new SearchSpaceDefinitionError("Parameter names must be unique.", [...new Set(duplicates)]);
		}
		this._parameters = new Map(parameters.map((p) => [p.name, p]));
		this.setParameterConstraints(parameterConstraints);
	}

	get isHierarchical(): boolean {
		return false;
	}

	get isRobust(): boolean {
		return false;
	}

	/** All parameters by name. */
	get parameters(): Record<string, Parameter> {
		return Object.fromEntries(this.parameterMap);
	}

	/** Name lookup behind `parameters`; subclasses that declare more parameters extend it. */
	protected get parameterMap(): ReadonlyMap<string, Parameter> {
		return this._parameters;
	}

	get parameterConstraints(): readonly ParameterConstraint[] {
		return this._parameterConstraints;
	}

	get rangeParameters(): Record<string, RangeParameter> {
		const result: Record<string, RangeParameter> = {};
		for (const [name, parameter] of Object.entries(this.parameters)) {
			if (parameter.kind === "range") result[name] = parameter;
		}
		return result;
	}

	get choiceParameters(): Record<string, ChoiceParameter> {
		const result: Record<string, ChoiceParameter> = {};
		for (const [name, parameter] of Object.entries(this.parameters)) {
			if (parameter.kind === "choice") result[name] = parameter;
		}
		return result;
	}

	get fixedParameters(): Record<string, FixedParameter> {
		const result: Record<string, FixedParameter> = {};
		for (const [name, parameter] of Object.entries(this.parameters)) {
			if (parameter.kind === "fixed") result[name] = parameter;
		}
		return result;
	}

	/** Every parameter that is not fixed. */
	get tunableParameters(): Record<string, Parameter> {
		const result: Record<string, Parameter> = {};
		for (const [name, parameter] of Object.entries(this.parameters)) {
			if (parameter.kind !== "fixed") result[name] = parameter;
		}
		return result;
	}

	hasParameter(name: string): boolean {
		return this.parameterMap.has(name);
	}

	/**
	 * @throws {ParameterValueError} when the name is not declared
	 */
	getParameter(name: string): Parameter {
		const parameter = this.parameterMap.get(name);
		if (parameter === undefined) {
			throw new ParameterValueError(`Parameter '${name}' is not part of the search space.`, name);
		}
		return parameter;
	}

	addParameterConstraints(parameterConstraints: readonly ParameterConstraint[]): void {
		this.validateParameterConstraints(parameterConstraints);
		this.rebindConstraints(parameterConstraints);
		this._parameterConstraints = [...this._parameterConstraints, ...parameterConstraints];
	}

	/**
	 * Replace all constraints. Every referenced parameter must exist and,
	 * for constraints holding parameter objects, match the space's
	 * definition; those objects are then replaced by the space's own.
	 */
	setParameterConstraints(parameterConstraints: readonly ParameterConstraint[]): void {
		this.validateParameterConstraints(parameterConstraints);
		this.rebindConstraints(parameterConstraints);
		this._parameterConstraints = [...parameterConstraints];
	}

	addParameter(parameter: Parameter): void {
		if (this.hasParameter(parameter.name)) {
			throw new SearchSpaceDefinitionError(
				`Parameter \`${parameter.name}\` already exists in search space. Use \`updateParameter\` to update an existing parameter.`,
				[parameter.name],
			);
		}
		this._parameters.set(parameter.name, parameter);
	}

	/**
	 * Replace a parameter's definition. The value type may not change.
	 */
	updateParameter(parameter: Parameter): void {
		const previous = this._parameters.get(parameter.name);
		if (previous === undefined) {
			throw new SearchSpaceDefinitionError(
				`Parameter \`${parameter.name}\` does not exist in search space. Use \`addParameter\` to add a new parameter.`,
				[parameter.name],
			);
		}
		if (previous.parameterType !== parameter.parameterType) {
			throw new SearchSpaceDefinitionError(
				`Parameter \`${parameter.name}\` has type ${previous.parameterType}. Cannot update to type ${parameter.parameterType}.`,
				[parameter.name],
			);
		}
		this._parameters.set(parameter.name, parameter);
		// Constraints must keep pointing at the instances the space owns.
		this.rebindConstraints(this._parameterConstraints);
	}

	/**
	 * Whether the parameterization names exactly the declared parameters.
	 */
	checkAllParametersPresent(parameterization: Parameterization, options: { raiseError?: boolean } = {}): boolean {
		const given = new Set(Object.keys(parameterization));
		const declared = new Set(Object.keys(this.parameters));
		const same = given.size === declared.size && [...given].every((name) => declared.has(name));
		if (!same) {
			if (options.raiseError) {
				throw new ParameterValueError(
					`Parameterization has parameters: ${formatNames(given)}, but search space has parameters: ${formatNames(declared)}.`,
				);
			}
			return false;
		}
		return true;
	}

	/**
	 * Whether the parameterization lies in the space: every value in its
	 * parameter's domain, then every constraint satisfied. Constraint
	 * evaluation treats ints and floats alike.
	 */
	checkMembership(parameterization: Parameterization, options: MembershipOptions = {}): boolean {
		const { raiseError = false, checkAllParametersPresent = true } = options;
		if (checkAllParametersPresent && !this.checkAllParametersPresent(parameterization, { raiseError })) {
			return false;
		}

		const numericValues: Record<string, number> = {};
		for (const [name, value] of Object.entries(parameterization)) {
			const parameter = this.parameterMap.get(name);
			if (parameter === undefined) {
				if (raiseError) {
					throw new ParameterValueError(`Parameter '${name}' is not part of the search space.`, name);
				}
				return false;
			}
			if (!parameter.validate(value)) {
				if (raiseError) {
					throw new ParameterValueError(`${formatValue(value)} is not a valid value for parameter ${parameter}`, name, {
						value,
					});
				}
				return false;
			}
			if (parameter.isNumeric) {
				numericValues[name] = Number(value);
			}
		}

		for (const constraint of this._parameterConstraints) {
			// Constraints over parameters absent from a partial parameterization are not evaluated.
			if (!constraint.parameterNames.every((name) => Object.hasOwn(numericValues, name))) continue;
			if (!constraint.check(numericValues)) {
				if (raiseError) {
					throw new ConstraintViolationError(`Parameter constraint ${constraint} is violated.`, String(constraint));
				}
				return false;
			}
		}
		return true;
	}

	/**
	 * Whether each value has a type its parameter accepts.
	 */
	checkTypes(parameterization: Parameterization, options: TypeCheckOptions = {}): boolean {
		const { allowNone = true, allowExtraParams = true, raiseError = false } = options;
		for (const [name, value] of Object.entries(parameterization)) {
			const parameter = this.parameterMap.get(name);
			if (parameter === undefined) {
				if (allowExtraParams) continue;
				if (raiseError) {
					throw new ParameterValueError(`Parameter ${name} not defined in search space`, name);
				}
				return false;
			}
			if (value === null && allowNone) continue;
			if (!parameter.isValidType(value)) {
				if (raiseError) {
					throw new ParameterValueError(`${formatValue(value)} is not a valid value for parameter ${parameter}`, name, {
						value,
					});
				}
				return false;
			}
		}
		return true;
	}

	/**
	 * Cast each declared parameter's value to its type. Names the space does
	 * not declare pass through unchanged.
	 */
	castArm(arm: Arm): Arm {
		const cast: Parameterization = {};
		for (const [name, value] of Object.entries(arm.parameters)) {
			const parameter = this.parameterMap.get(name);
			cast[name] = parameter === undefined ? value : parameter.cast(value);
		}
		return new Arm(cast, arm.name);
	}

	/**
	 * Arm with every parameter unset; stands for a point outside the design.
	 */
	outOfDesignArm(): Arm {
		return this.constructArm();
	}

	/**
	 * Build an arm from the given values; parameters not given stay unset (`null`).
	 *
	 * @throws {ParameterValueError} for unknown names or invalid values
	 */
	constructArm(parameters?: Parameterization, name?: string): Arm {
		const finalParameters: Parameterization = Object.fromEntries([...this.parameterMap.keys()].map((key) => [key, null]));
		if (parameters !== undefined) {
			for (const [key, value] of Object.entries(parameters)) {
				const parameter = this.parameterMap.get(key);
				if (parameter === undefined) {
					throw new ParameterValueError(`\`${key}\` does not exist in search space.`, key);
				}
				if (value !== null && !parameter.validate(value)) {
					throw new ParameterValueError(`\`${formatValue(value)}\` is not a valid value for parameter ${key}.`, key, {
						value,
					});
				}
			}
			Object.assign(finalParameters, parameters);
		}
		return new Arm(finalParameters, name);
	}

	/**
	 * Strict acceptance: membership in raising mode, then an exact match
	 * between each value's runtime type and its parameter's value type.
	 *
	 * @throws {ParameterValueError | ConstraintViolationError | ParameterizationTypeError}
	 */
	validateMembership(parameterization: Parameterization): void {
		this.checkMembership(parameterization, { raiseError: true });
		for (const [name, parameter] of Object.entries(this.parameters)) {
			if (!this.requiresValueFor(name, parameterization)) continue;
			const value: ParameterValue = parameterization[name] ?? null;
			if (!parameter.matchesValueType(value)) {
				const received = valueTypeOf(value);
				throw new ParameterizationTypeError(
					`Value for parameter ${name}: ${formatValue(value)} is of type ${received}, expected ${parameter.parameterType}.`,
					name,
					parameter.parameterType,
					received,
				);
			}
		}
	}

	/** Whether strict validation expects `name` in the parameterization. */
	protected requiresValueFor(_name: string, _parameterization: Parameterization): boolean {
		return true;
	}

	clone(): SearchSpace {
		return new SearchSpace(
			[...this._parameters.values()].map((p) => p.clone()),
			this._parameterConstraints.map((c) => c.clone()),
		);
	}

	equals(other: SearchSpace): boolean {
		return this.constructor === other.constructor && this.toString() === other.toString();
	}

	/** One row per parameter, in declaration order. */
	summary(): ParameterSummary[] {
		return Object.values(this.parameters).map((p) => p.summary());
	}

	/**
	 * Render `summary()` as an aligned text table. Columns no parameter fills
	 * are left out.
	 */
	summaryTable(): string {
		const rows = this.summary();
		const columns = SUMMARY_COLUMNS.filter(([key]) => rows.some((row) => row[key] !== undefined));
		const cells = rows.map((row) => columns.map(([key]) => renderCell(row[key])));
		const header = columns.map(([, title]) => title);
		const widths = header.map((title, i) => Math.max(title.length, ...cells.map((line) => line[i]?.length ?? 0)));
		const render = (line: string[]) =>
			line
				.map((cell, i) => cell.padEnd(widths[i] ?? 0))
				.join("  ")
				.trimEnd();
		return [render(header), ...cells.map(render)].join("\n");
	}

	toString(): string {
		const parameters = Object.values(this.parameters).map(String).join(", ");
		const constraints = this._parameterConstraints.map(String).join(", ");
		return `${this.constructor.name}(parameters=[${parameters}], parameterConstraints=[${constraints}])`;
	}

	private validateParameterConstraints(parameterConstraints: readonly ParameterConstraint[]): void {
		for (const constraint of parameterConstraints) {
			for (const name of constraint.parameterNames) {
				const own = this._parameters.get(name);
				if (own === undefined) {
					throw new SearchSpaceDefinitionError(`\`${name}\` does not exist in search space.`, [name]);
				}
				if (!own.isNumeric) {
					throw new SearchSpaceDefinitionError(
						`Parameter constraints only support numeric parameters; \`${name}\` is ${own.parameterType}.`,
						[name],
					);
				}
			}
			if (isBoundConstraint(constraint)) {
				for (const parameter of constraint.parameters) {
					const own = this._parameters.get(parameter.name);
					if (own !== undefined && !own.equals(parameter)) {
						throw new SearchSpaceDefinitionError(
							`Parameter constraint's definition of '${parameter.name}' does not match the SearchSpace's definition.`,
							[parameter.name],
						);
					}
				}
			}
		}
	}

	private rebindConstraints(parameterConstraints: readonly ParameterConstraint[]): void {
		for (const constraint of parameterConstraints) {
			if (isBoundConstraint(constraint)) {
				constraint.rebind((name) => this.ownParameter(name));
			}
		}
	}

	private ownParameter(name: string): Parameter {
		const parameter = this._parameters.get(name);
		if (parameter === undefined) {
			throw new SearchSpaceDefinitionError(`\`${name}\` does not exist in search space.`, [name]);
		}
		return parameter;
	}
}

function formatNames(names: Iterable<string>): string {
	return `{${[...names].map((n) => `'${n}'`).join(", ")}}`;
}

function renderCell(value: ParameterSummary[keyof ParameterSummary]): string {
	if (value === undefined) return "None";
	if (typeof value === "object" && value !== null) {
		return Object.entries(value)
			.map(([key, names]) => `${key}: [${names.join(", ")}]`)
			.join("; ");
	}
	if (value === "") return "None";
	return String(value);
}
