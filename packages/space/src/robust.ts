import { SearchSpaceDefinitionError, UnsupportedOperationError } from "@paramspace/common";
import type { ParameterConstraint } from "./constraint";
import type { ParameterDistribution } from "./distribution";
import type { Parameter } from "./parameter";
import { SearchSpace } from "./search-space";

export interface RobustSearchSpaceOptions {
	parameters: readonly Parameter[];
	/** Distributions of environmental variables and of input perturbations. */
	parameterDistributions: readonly ParameterDistribution[];
	/** Samples drawn from the distributions per evaluation of a risk measure. */
	numSamples: number;
	/** Parameters outside the controllable design; each needs a distribution. */
	environmentalVariables?: readonly Parameter[];
	parameterConstraints?: readonly ParameterConstraint[];
}

interface ResolvedDistributions {
	distributionalParameters: Set<string>;
	environmentalDistributions: ParameterDistribution[];
	perturbationDistributions: ParameterDistribution[];
	multiplicative: boolean;
}

/**
 * Search space for robust optimization: some parameters carry a probability
 * distribution, either because they are environmental variables or because
 * their inputs are noisy.
 *
 * Distributions are bound at construction, so parameters cannot be updated.
 */
export class RobustSearchSpace extends SearchSpace {
	readonly numSamples: number;
	readonly parameterDistributions: readonly ParameterDistribution[];
	/** Whether perturbations scale (true) or shift (false) parameter values. */
	readonly multiplicative: boolean;
	private readonly _environmentalVariables: Map<string, Parameter>;
	private readonly _distributionalParameters: Set<string>;
	private readonly _environmentalDistributions: readonly ParameterDistribution[];
	private readonly _perturbationDistributions: readonly ParameterDistribution[];

	constructor(options: RobustSearchSpaceOptions) {
		const { parameters, parameterDistributions, numSamples, environmentalVariables = [] } = options;
		if (parameterDistributions.length === 0) {
			throw new SearchSpaceDefinitionError(
				"RobustSearchSpace requires at least one distributional parameter. Use SearchSpace instead.",
			);
		}
		if (!Number.isInteger(numSamples) || numSamples < 1) {
			throw new SearchSpaceDefinitionError("`numSamples` must be a positive integer!");
		}
		const environmentalNames = environmentalVariables.map((p) => p.name);
		if (new Set(environmentalNames).size < environmentalNames.length) {
			throw new SearchSpaceDefinitionError("Environmental variable names must be unique!", environmentalNames);
		}
		const parameterNames = new Set(parameters.map((p) => p.name));
		for (const name of environmentalNames) {
			if (parameterNames.has(name)) {
				throw new SearchSpaceDefinitionError(
					`Environmental variable ${name} should not be repeated in parameters.`,
					[name],
				);
			}
		}

		super(parameters, options.parameterConstraints);
		this.numSamples = numSamples;
		this.parameterDistributions = [...parameterDistributions];
		this._environmentalVariables = new Map(environmentalVariables.map((p) => [p.name, p]));

		const resolved = this.resolveDistributions();
		this._distributionalParameters = resolved.distributionalParameters;
		this._environmentalDistributions = resolved.environmentalDistributions;
		this._perturbationDistributions = resolved.perturbationDistributions;
		this.multiplicative = resolved.multiplicative;
	}

	override get isRobust(): boolean {
		return true;
	}

	/** Ordinary parameters together with the environmental variables. */
	protected override get parameterMap(): ReadonlyMap<string, Parameter> {
		// Unset while the base constructor runs.
		if (this._environmentalVariables === undefined) return this._parameters;
		return new Map([...this._parameters, ...this._environmentalVariables]);
	}

	get environmentalVariables(): Record<string, Parameter> {
		return Object.fromEntries(this._environmentalVariables);
	}

	get environmentalDistributions(): readonly ParameterDistribution[] {
		return this._environmentalDistributions;
	}

	get perturbationDistributions(): readonly ParameterDistribution[] {
		return this._perturbationDistributions;
	}

	/** Names covered by some distribution. */
	get distributionalParameters(): ReadonlySet<string> {
		return this._distributionalParameters;
	}

	isEnvironmentalVariable(parameterName: string): boolean {
		return this._environmentalVariables.has(parameterName);
	}

	override updateParameter(_parameter: Parameter): void {
		throw new UnsupportedOperationError("RobustSearchSpace does not support `updateParameter`.", "updateParameter");
	}

	override clone(): RobustSearchSpace {
		return new RobustSearchSpace({
			parameters: [...this._parameters.values()].map((p) => p.clone()),
			parameterDistributions: this.parameterDistributions.map((d) => d.clone()),
			numSamples: this.numSamples,
			environmentalVariables: [...this._environmentalVariables.values()].map((p) => p.clone()),
			parameterConstraints: this._parameterConstraints.map((c) => c.clone()),
		});
	}

	override toString(): string {
		const parameters = [...this._parameters.values()].map(String).join(", ");
		const distributions = this.parameterDistributions.map(String).join(", ");
		const environmental = [...this._environmentalVariables.values()].map(String).join(", ");
		const constraints = this._parameterConstraints.map(String).join(", ");
		return `RobustSearchSpace(parameters=[${parameters}], parameterDistributions=[${distributions}], numSamples=${this.numSamples}, environmentalVariables=[${environmental}], parameterConstraints=[${constraints}])`;
	}

	/**
	 * Check the distributions against the space and split them into
	 * environmental and perturbation groups.
	 */
	private resolveDistributions(): ResolvedDistributions {
		const distributions = this.parameterDistributions;
		const distributionalParameters = new Set<string>();
		for (const distribution of distributions) {
			const duplicates = distribution.parameters.filter((name) => distributionalParameters.has(name));
			if (duplicates.length > 0) {
				throw new SearchSpaceDefinitionError(
					`Received multiple parameter distributions for parameters [${duplicates.join(", ")}]. Make sure that there is at most one distribution specified for any given parameter / environmental variable.`,
					duplicates,
				);
			}
			for (const name of distribution.parameters) distributionalParameters.add(name);
		}

		const environmentalNames = new Set(this._environmentalVariables.keys());
		const uncovered = [...environmentalNames].filter((name) => !distributionalParameters.has(name));
		if (uncovered.length > 0) {
			throw new SearchSpaceDefinitionError(
				"All environmental variables must have a distribution specified.",
				uncovered,
			);
		}

		const environmentalDistributions: ParameterDistribution[] = [];
		const perturbationDistributions: ParameterDistribution[] = [];
		for (const distribution of distributions) {
			const isEnvironmental = distribution.parameters.map((name) => environmentalNames.has(name));
			if (isEnvironmental.some(Boolean) && !isEnvironmental.every(Boolean)) {
				throw new UnsupportedOperationError(
					`A ParameterDistribution must represent either the distribution of a set of environmental variables or a set of parameter perturbations. Mixing the distribution of both types in a single ParameterDistribution is not supported. Offending distribution: ${distribution}.`,
					"mixedDistribution",
				);
			}
			if (isEnvironmental.every(Boolean)) {
				environmentalDistributions.push(distribution);
			} else {
				perturbationDistributions.push(distribution);
			}
		}
		if (environmentalDistributions.some((d) => d.multiplicative)) {
			throw new SearchSpaceDefinitionError(
				"Distributions of environmental variables must have `multiplicative=false`.",
				environmentalDistributions.filter((d) => d.multiplicative).flatMap((d) => d.parameters),
			);
		}

		const parameters = this.parameterMap;
		for (const name of distributionalParameters) {
			const parameter = parameters.get(name);
			if (parameter === undefined) {
				throw new SearchSpaceDefinitionError(
					`Distribution over \`${name}\`, which is neither a parameter nor an environmental variable.`,
					[name],
				);
			}
			if (parameter.kind !== "range") {
				throw new SearchSpaceDefinitionError(
					"All parameters with an associated distribution must be range parameters.",
					[name],
				);
			}
		}

		const flags = perturbationDistributions.map((d) => d.multiplicative);
		if (!(flags.every(Boolean) || !flags.some(Boolean))) {
			throw new UnsupportedOperationError(
				"Non-environmental parameter distributions must be either all multiplicative or all additive (not multiplicative).",
				"mixedPolarity",
			);
		}

		return {
			distributionalParameters,
			environmentalDistributions,
			perturbationDistributions,
			multiplicative: flags.some(Boolean),
		};
	}
}
