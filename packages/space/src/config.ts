import { SearchSpaceConfigError } from "@paramspace/common";
import { z } from "zod";
import { OrderConstraint, ParameterConstraint, SumConstraint } from "./constraint";
import { ParameterDistribution } from "./distribution";
import { HierarchicalSearchSpace } from "./hierarchical";
import { ChoiceParameter, type Dependents, FixedParameter, type Parameter, RangeParameter } from "./parameter";
import { RobustSearchSpace } from "./robust";
import { SearchSpace } from "./search-space";
import type { ParameterType, ParameterValue } from "./types";

const ScalarSchema = z.union([z.string(), z.number().finite(), z.boolean()]);
const ParameterTypeSchema = z.enum(["int", "float", "string", "bool"]);
// JSON object keys are strings; they are matched against the rendered values.
const DependentsSchema = z.record(z.string(), z.array(z.string().min(1)).min(1));

const RangeConfigSchema = z.object({
	type: z.literal("range"),
	name: z.string().min(1),
	parameterType: z.enum(["int", "float"]).default("float"),
	lower: z.number().finite(),
	upper: z.number().finite(),
	logScale: z.boolean().optional(),
	logitScale: z.boolean().optional(),
	digits: z.number().int().nonnegative().optional(),
	isFidelity: z.boolean().optional(),
	targetValue: z.number().finite().optional(),
});

const ChoiceConfigSchema = z.object({
	type: z.literal("choice"),
	name: z.string().min(1),
	/** Inferred from the values when omitted. */
	parameterType: ParameterTypeSchema.optional(),
	values: z.array(ScalarSchema).min(2),
	isOrdered: z.boolean().optional(),
	isTask: z.boolean().optional(),
	sortValues: z.boolean().optional(),
	isFidelity: z.boolean().optional(),
	targetValue: ScalarSchema.optional(),
	dependents: DependentsSchema.optional(),
});

const FixedConfigSchema = z.object({
	type: z.literal("fixed"),
	name: z.string().min(1),
	parameterType: ParameterTypeSchema.optional(),
	value: ScalarSchema,
	dependents: DependentsSchema.optional(),
});

export const ParameterConfigSchema = z.discriminatedUnion("type", [
	RangeConfigSchema,
	ChoiceConfigSchema,
	FixedConfigSchema,
]);
export type ParameterConfig = z.infer<typeof ParameterConfigSchema>;

export const ConstraintConfigSchema = z.discriminatedUnion("type", [
	z.object({ type: z.literal("order"), lower: z.string(), upper: z.string() }),
	z.object({
		type: z.literal("sum"),
		parameters: z.array(z.string()).min(1),
		isUpperBound: z.boolean().default(true),
		bound: z.number().finite(),
	}),
	z.object({
		type: z.literal("linear"),
		coefficients: z.record(z.string(), z.number().finite()),
		bound: z.number().finite(),
	}),
]);
export type ConstraintConfig = z.infer<typeof ConstraintConfigSchema>;

const ArgumentSchema = z.union([z.number().finite(), z.array(z.number().finite()).min(1)]);

const DistributionConfigSchema = z.object({
	parameters: z.array(z.string()).min(1),
	distribution: z.discriminatedUnion("name", [
		z.object({ name: z.literal("normal"), loc: ArgumentSchema, scale: ArgumentSchema }),
		z.object({ name: z.literal("uniform"), low: ArgumentSchema, high: ArgumentSchema }),
		z.object({ name: z.literal("lognormal"), mu: ArgumentSchema, sigma: ArgumentSchema }),
	]),
	multiplicative: z.boolean().default(false),
});

export const SearchSpaceConfigSchema = z
	.object({
		parameters: z.array(ParameterConfigSchema).min(1),
		parameterConstraints: z.array(ConstraintConfigSchema).default([]),
		hierarchical: z.boolean().default(false),
		robust: z
			.object({
				numSamples: z.number().int().positive(),
				environmentalVariables: z.array(RangeConfigSchema).default([]),
				distributions: z.array(DistributionConfigSchema).min(1),
			})
			.optional(),
	})
	.refine((config) => !(config.hierarchical && config.robust), {
		message: "A search space cannot be both hierarchical and robust.",
		path: ["robust"],
	});
export type SearchSpaceConfig = z.infer<typeof SearchSpaceConfigSchema>;

/**
 * Validate a plain object (typically parsed JSON) and build the search space
 * it describes: a `HierarchicalSearchSpace` when `hierarchical` is set, a
 * `RobustSearchSpace` when a `robust` section is present, a flat
 * `SearchSpace` otherwise.
 *
 * Shape problems raise `SearchSpaceConfigError`; a well-formed config that
 * describes an invalid space raises the usual definition errors.
 */
export function parseSearchSpaceConfig(input: unknown): SearchSpace {
	const result = SearchSpaceConfigSchema.safeParse(input);
	if (!result.success) {
		const issues = result.error.issues.map((issue) => issue.path.join("."));
		const details = result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
		throw new SearchSpaceConfigError(`Invalid search space config: ${details.join("; ")}`, issues, result.error);
	}
	const config = result.data;

	const parameters = config.parameters.map((parameter, index) => buildParameter(parameter, `parameters.${index}`));
	const byName = new Map(parameters.map((p) => [p.name, p]));
	const constraints = config.parameterConstraints.map((constraint, index) =>
		buildConstraint(constraint, byName, `parameterConstraints.${index}`),
	);

	if (config.robust) {
		return new RobustSearchSpace({
			parameters,
			parameterConstraints: constraints,
			numSamples: config.robust.numSamples,
			environmentalVariables: config.robust.environmentalVariables.map((parameter, index) =>
				buildParameter(parameter, `robust.environmentalVariables.${index}`),
			),
			parameterDistributions: config.robust.distributions.map(
				(d) =>
					new ParameterDistribution({
						parameters: d.parameters,
						distribution: d.distribution,
						multiplicative: d.multiplicative,
					}),
			),
		});
	}
	if (config.hierarchical) {
		return new HierarchicalSearchSpace(parameters, constraints);
	}
	return new SearchSpace(parameters, constraints);
}

function buildParameter(config: ParameterConfig, path: string): Parameter {
	switch (config.type) {
		case "range":
			return new RangeParameter({
				name: config.name,
				parameterType: config.parameterType,
				lower: config.lower,
				upper: config.upper,
				logScale: config.logScale,
				logitScale: config.logitScale,
				digits: config.digits,
				isFidelity: config.isFidelity,
				targetValue: config.targetValue,
			});
		case "choice":
			return new ChoiceParameter({
				name: config.name,
				parameterType: config.parameterType ?? inferType(config.values),
				values: config.values,
				isOrdered: config.isOrdered,
				isTask: config.isTask,
				sortValues: config.sortValues,
				isFidelity: config.isFidelity,
				targetValue: config.targetValue,
				dependents: config.dependents && resolveDependents(config.name, config.dependents, config.values, path),
			});
		case "fixed":
			return new FixedParameter({
				name: config.name,
				parameterType: config.parameterType ?? inferType([config.value]),
				value: config.value,
				dependents: config.dependents && resolveDependents(config.name, config.dependents, [config.value], path),
			});
	}
}

function buildConstraint(
	config: ConstraintConfig,
	parameters: ReadonlyMap<string, Parameter>,
	path: string,
): ParameterConstraint {
	const lookup = (name: string, field: string): Parameter => {
		const parameter = parameters.get(name);
		if (parameter === undefined) {
			throw new SearchSpaceConfigError(`Constraint references unknown parameter \`${name}\`.`, [`${path}.${field}`]);
		}
		return parameter;
	};
	switch (config.type) {
		case "order":
			return new OrderConstraint(lookup(config.lower, "lower"), lookup(config.upper, "upper"));
		case "sum":
			return new SumConstraint(
				config.parameters.map((name, i) => lookup(name, `parameters.${i}`)),
				config.isUpperBound,
				config.bound,
			);
		case "linear":
			return new ParameterConstraint(config.coefficients, config.bound);
	}
}

function inferType(values: readonly Exclude<ParameterValue, null>[]): ParameterType {
	if (values.every((v) => typeof v === "boolean")) return "bool";
	if (values.every((v) => typeof v === "number")) {
		return values.every((v) => Number.isInteger(v)) ? "int" : "float";
	}
	return "string";
}

function resolveDependents(
	name: string,
	dependents: Record<string, string[]>,
	values: readonly Exclude<ParameterValue, null>[],
	path: string,
): Dependents {
	const resolved = new Map<ParameterValue, readonly string[]>();
	for (const [key, names] of Object.entries(dependents)) {
		const value = values.find((v) => String(v) === key);
		if (value === undefined) {
			throw new SearchSpaceConfigError(`Dependents of \`${name}\` are keyed by '${key}', which is not one of its values.`, [
				`${path}.dependents.${key}`,
			]);
		}
		resolved.set(value, names);
	}
	return resolved;
}
