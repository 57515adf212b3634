export { Arm } from "./arm";
export {
	type ConstraintConfig,
	ConstraintConfigSchema,
	type ParameterConfig,
	ParameterConfigSchema,
	parseSearchSpaceConfig,
	type SearchSpaceConfig,
	SearchSpaceConfigSchema,
} from "./config";
export { INT_TOLERANCE, NUMERIC_TOLERANCE } from "./constants";
export {
	type BoundConstraint,
	isBoundConstraint,
	OrderConstraint,
	ParameterConstraint,
	type ParameterLookup,
	SumConstraint,
} from "./constraint";
export {
	createRobustSearchSpaceDigest,
	createSearchSpaceDigest,
	type DigestOptions,
	extractRobustDigest,
	extractSearchSpaceDigest,
	type RobustSearchSpaceDigest,
	type RobustSearchSpaceDigestInit,
	type Sampler,
	type SearchSpaceDigest,
	type SearchSpaceDigestInit,
} from "./digest";
export { type DistributionSpec, ParameterDistribution, type ParameterDistributionOptions } from "./distribution";
export { dummyValue, type FlattenOptions, HierarchicalSearchSpace } from "./hierarchical";
export { ObservationFeatures, type ObservationFeaturesInit } from "./observation";
export {
	BaseParameter,
	ChoiceParameter,
	type ChoiceParameterOptions,
	type Dependents,
	FixedParameter,
	type FixedParameterOptions,
	isParameter,
	type Parameter,
	type ParameterSummary,
	RangeParameter,
	type RangeParameterOptions,
} from "./parameter";
export { RobustSearchSpace, type RobustSearchSpaceOptions } from "./robust";
export { type MembershipOptions, SearchSpace, type TypeCheckOptions } from "./search-space";
export type { ParameterKind, ParameterType, ParameterValue, Parameterization, RandomSource } from "./types";
export { castValue, formatValue, isValidValueType, matchesValueType, valueTypeOf } from "./values";
