import { SearchSpaceDefinitionError, UnsupportedOperationError } from "@paramspace/common";
import type { ParameterDistribution } from "./distribution";
import { RobustSearchSpace } from "./robust";
import type { SearchSpace } from "./search-space";
import type { RandomSource } from "./types";

/** Draws a `numSamples x d` matrix of samples. */
export type Sampler = () => number[][];

/**
 * Array-oriented snapshot of a search space for a modeling layer. Indices in
 * every field refer to positions in `featureNames`.
 */
export interface SearchSpaceDigest {
	readonly featureNames: readonly string[];
	/** Inclusive `[lower, upper]` per feature. */
	readonly bounds: readonly (readonly [number, number])[];
	readonly ordinalFeatures: readonly number[];
	readonly categoricalFeatures: readonly number[];
	readonly discreteChoices: ReadonlyMap<number, readonly number[]>;
	readonly taskFeatures: readonly number[];
	readonly fidelityFeatures: readonly number[];
	/** Target values of fidelity and task features. */
	readonly targetValues: ReadonlyMap<number, number>;
	readonly robustDigest: RobustSearchSpaceDigest | undefined;
}

export interface RobustSearchSpaceDigest {
	/** Samples perturbations of the non-environmental features. */
	readonly sampleParamPerturbations: Sampler | undefined;
	/** Samples the environmental variables. */
	readonly sampleEnvironmental: Sampler | undefined;
	readonly environmentalVariables: readonly string[];
	/** Only meaningful together with `sampleParamPerturbations`. */
	readonly multiplicative: boolean;
}

export interface SearchSpaceDigestInit {
	featureNames: readonly string[];
	bounds: readonly (readonly [number, number])[];
	ordinalFeatures?: readonly number[];
	categoricalFeatures?: readonly number[];
	discreteChoices?: ReadonlyMap<number, readonly number[]>;
	taskFeatures?: readonly number[];
	fidelityFeatures?: readonly number[];
	targetValues?: ReadonlyMap<number, number>;
	robustDigest?: RobustSearchSpaceDigest;
}

export function createSearchSpaceDigest(init: SearchSpaceDigestInit): SearchSpaceDigest {
	if (init.bounds.length !== init.featureNames.length) {
		throw new SearchSpaceDefinitionError("A digest needs exactly one bounds pair per feature.", init.featureNames);
	}
	return Object.freeze({
		featureNames: Object.freeze([...init.featureNames]),
		bounds: Object.freeze(init.bounds.map(([lower, upper]) => Object.freeze([lower, upper] as const))),
		ordinalFeatures: Object.freeze([...(init.ordinalFeatures ?? [])]),
		categoricalFeatures: Object.freeze([...(init.categoricalFeatures ?? [])]),
		discreteChoices: new Map(init.discreteChoices ?? []),
		taskFeatures: Object.freeze([...(init.taskFeatures ?? [])]),
		fidelityFeatures: Object.freeze([...(init.fidelityFeatures ?? [])]),
		targetValues: new Map(init.targetValues ?? []),
		robustDigest: init.robustDigest,
	});
}

export interface RobustSearchSpaceDigestInit {
	sampleParamPerturbations?: Sampler;
	sampleEnvironmental?: Sampler;
	environmentalVariables?: readonly string[];
	multiplicative?: boolean;
}

/**
 * @throws {SearchSpaceDefinitionError} when neither sampler is given
 */
export function createRobustSearchSpaceDigest(init: RobustSearchSpaceDigestInit): RobustSearchSpaceDigest {
	if (init.sampleParamPerturbations === undefined && init.sampleEnvironmental === undefined) {
		throw new SearchSpaceDefinitionError(
			"A robust digest needs at least one of `sampleParamPerturbations` and `sampleEnvironmental`.",
		);
	}
	return Object.freeze({
		sampleParamPerturbations: init.sampleParamPerturbations,
		sampleEnvironmental: init.sampleEnvironmental,
		environmentalVariables: Object.freeze([...(init.environmentalVariables ?? [])]),
		multiplicative: init.multiplicative ?? false,
	});
}

export interface DigestOptions {
	/** Uniform source handed to the robust samplers. */
	random?: RandomSource;
}

/**
 * Project `searchSpace` onto the features in `paramNames`, in that order.
 * The space is expected to be already transformed for modeling: fixed and
 * log-scale parameters are not accepted, and choices must be numeric.
 *
 * Robust spaces also get a robust digest; see `extractRobustDigest`.
 */
export function extractSearchSpaceDigest(
	searchSpace: SearchSpace,
	paramNames: readonly string[],
	options: DigestOptions = {},
): SearchSpaceDigest {
	const bounds: [number, number][] = [];
	const ordinalFeatures: number[] = [];
	const categoricalFeatures: number[] = [];
	const discreteChoices = new Map<number, number[]>();
	const taskFeatures: number[] = [];
	const fidelityFeatures: number[] = [];
	const targetValues = new Map<number, number>();

	paramNames.forEach((name, index) => {
		const parameter = searchSpace.getParameter(name);
		switch (parameter.kind) {
			case "range": {
				if (parameter.logScale || parameter.logitScale) {
					throw new UnsupportedOperationError(
						`Parameter \`${name}\` is on a log or logit scale; transform it before extracting a digest.`,
						"extractSearchSpaceDigest",
					);
				}
				bounds.push([parameter.lower, parameter.upper]);
				if (parameter.parameterType === "int") {
					ordinalFeatures.push(index);
					discreteChoices.set(index, integerRange(parameter.lower, parameter.upper));
				}
				if (parameter.isFidelity && typeof parameter.targetValue === "number") {
					fidelityFeatures.push(index);
					targetValues.set(index, parameter.targetValue);
				}
				return;
			}
			case "choice": {
				const values = parameter.values.filter((value): value is number => typeof value === "number");
				if (values.length !== parameter.values.length) {
					throw new UnsupportedOperationError(
						`Choice parameter \`${name}\` has non-numeric values; encode it before extracting a digest.`,
						"extractSearchSpaceDigest",
					);
				}
				bounds.push([Math.min(...values), Math.max(...values)]);
				if (parameter.isTask) {
					taskFeatures.push(index);
					if (typeof parameter.targetValue === "number") targetValues.set(index, parameter.targetValue);
				} else if (parameter.isOrdered) {
					ordinalFeatures.push(index);
				} else {
					categoricalFeatures.push(index);
				}
				if (parameter.isFidelity && typeof parameter.targetValue === "number") {
					fidelityFeatures.push(index);
					targetValues.set(index, parameter.targetValue);
				}
				discreteChoices.set(index, values);
				return;
			}
			case "fixed":
				throw new UnsupportedOperationError(
					`Fixed parameter \`${name}\` cannot be part of a digest; remove it first.`,
					"extractSearchSpaceDigest",
				);
		}
	});

	return createSearchSpaceDigest({
		featureNames: paramNames,
		bounds,
		ordinalFeatures,
		categoricalFeatures,
		discreteChoices,
		taskFeatures,
		fidelityFeatures,
		targetValues,
		robustDigest:
			searchSpace instanceof RobustSearchSpace ? extractRobustDigest(searchSpace, paramNames, options) : undefined,
	});
}

/**
 * Bind samplers to the distributions of a robust space. Environmental
 * variables must come last in `paramNames`; perturbations cover the
 * remaining features, and features without a perturbation distribution get
 * the neutral value (1 when multiplicative, 0 otherwise).
 */
export function extractRobustDigest(
	searchSpace: RobustSearchSpace,
	paramNames: readonly string[],
	options: DigestOptions = {},
): RobustSearchSpaceDigest {
	const random = options.random ?? Math.random;
	const { numSamples } = searchSpace;
	const environmentalVariables = Object.keys(searchSpace.environmentalVariables);
	const designCount = paramNames.length - environmentalVariables.length;
	const trailing = paramNames.slice(designCount);
	if (designCount < 0 || !environmentalVariables.every((name) => trailing.includes(name))) {
		throw new SearchSpaceDefinitionError(
			"Environmental variables must be the last entries of the feature names.",
			environmentalVariables,
		);
	}
	const designNames = paramNames.slice(0, designCount);

	const sampleInto = (distributions: readonly ParameterDistribution[], columns: readonly string[], fill: number) => {
		const samples = Array.from({ length: numSamples }, () => new Array<number>(columns.length).fill(fill));
		for (const distribution of distributions) {
			const indices = distribution.parameters.map((name) => columns.indexOf(name));
			if (indices.some((i) => i < 0)) continue;
			distribution.sample(numSamples, random).forEach((draw, row) => {
				const target = samples[row];
				if (target === undefined) return;
				indices.forEach((column, k) => {
					target[column] = draw[k] ?? fill;
				});
			});
		}
		return samples;
	};

	const perturbations = searchSpace.perturbationDistributions;
	const environmental = searchSpace.environmentalDistributions;
	const fill = searchSpace.multiplicative ? 1 : 0;
	return createRobustSearchSpaceDigest({
		sampleParamPerturbations:
			perturbations.length > 0 ? () => sampleInto(perturbations, designNames, fill) : undefined,
		sampleEnvironmental: environmental.length > 0 ? () => sampleInto(environmental, trailing, 0) : undefined,
		environmentalVariables: trailing,
		multiplicative: searchSpace.multiplicative,
	});
}

function integerRange(lower: number, upper: number): number[] {
	return Array.from({ length: upper - lower + 1 }, (_, i) => lower + i);
}
