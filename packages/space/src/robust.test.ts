import { SearchSpaceDefinitionError, UnsupportedOperationError } from "@paramspace/common";
import { describe, expect, it } from "vitest";
import { type DistributionSpec, ParameterDistribution } from "./distribution";
import { ChoiceParameter, RangeParameter } from "./parameter";
import { RobustSearchSpace, type RobustSearchSpaceOptions } from "./robust";

const normal: DistributionSpec = { name: "normal", loc: 0, scale: 0.1 };

function range(name: string, upper = 1): RangeParameter {
	return new RangeParameter({ name, parameterType: "float", lower: 0, upper });
}

function distribution(parameters: string[], multiplicative = false): ParameterDistribution {
	return new ParameterDistribution({ parameters, distribution: normal, multiplicative });
}

function environmentalSpace(overrides: Partial<RobustSearchSpaceOptions> = {}): RobustSearchSpace {
	return new RobustSearchSpace({
		parameters: [range("x")],
		parameterDistributions: [
			new ParameterDistribution({ parameters: ["T"], distribution: { name: "uniform", low: 0, high: 100 } }),
			distribution(["x"]),
		],
		numSamples: 4,
		environmentalVariables: [range("T", 100)],
		...overrides,
	});
}

describe("RobustSearchSpace", () => {
	describe("construction", () => {
		it("should split environmental and perturbation distributions", () => {
			const space = environmentalSpace();

			expect(space.isRobust).toBe(true);
			expect(space.isEnvironmentalVariable("T")).toBe(true);
			expect(space.isEnvironmentalVariable("x")).toBe(false);
			expect(space.environmentalDistributions.map((d) => d.parameters)).toEqual([["T"]]);
			expect(space.perturbationDistributions.map((d) => d.parameters)).toEqual([["x"]]);
			expect([...space.distributionalParameters]).toEqual(["T", "x"]);
			expect(space.multiplicative).toBe(false);
		});

		it("should expose environmental variables among the parameters", () => {
			const space = environmentalSpace();

			expect(Object.keys(space.parameters)).toEqual(["x", "T"]);
			expect(Object.keys(space.environmentalVariables)).toEqual(["T"]);
			expect(space.checkMembership({ x: 0.5, T: 20 })).toBe(true);
			expect(space.checkMembership({ x: 0.5 })).toBe(false);
		});

		it("should require distributions and a positive sample count", () => {
			expect(() => environmentalSpace({ parameterDistributions: [] })).toThrow(
				"requires at least one distributional parameter",
			);
			expect(() => environmentalSpace({ numSamples: 0 })).toThrow("`numSamples` must be a positive integer!");
			expect(() => environmentalSpace({ numSamples: 1.5 })).toThrow(SearchSpaceDefinitionError);
		});

		it("should keep environmental variables apart from parameters", () => {
			expect(() => environmentalSpace({ environmentalVariables: [range("x")] })).toThrow(
				"Environmental variable x should not be repeated in parameters.",
			);
			expect(() => environmentalSpace({ environmentalVariables: [range("T"), range("T")] })).toThrow(
				"Environmental variable names must be unique!",
			);
		});
	});

	describe("distribution rules", () => {
		it("should reject parameters covered twice", () => {
			expect(() =>
				environmentalSpace({
					parameterDistributions: [distribution(["x"]), distribution(["x"]), distribution(["T"])],
				}),
			).toThrow("Received multiple parameter distributions for parameters [x].");
		});

		it("should require a distribution for every environmental variable", () => {
			expect(() => environmentalSpace({ parameterDistributions: [distribution(["x"])] })).toThrow(
				"All environmental variables must have a distribution specified.",
			);
		});

		it("should not mix environmental and design parameters in one distribution", () => {
			expect(() => environmentalSpace({ parameterDistributions: [distribution(["x", "T"])] })).toThrow(
				UnsupportedOperationError,
			);
		});

		it("should keep environmental distributions additive", () => {
			expect(() => environmentalSpace({ parameterDistributions: [distribution(["T"], true)] })).toThrow(
				"Distributions of environmental variables must have `multiplicative=false`.",
			);
		});

		it("should only cover range parameters that exist", () => {
			const optimizer = new ChoiceParameter({ name: "optimizer", parameterType: "float", values: [0.1, 0.2] });

			expect(() =>
				environmentalSpace({
					parameters: [range("x"), optimizer],
					parameterDistributions: [distribution(["T"]), distribution(["optimizer"])],
				}),
			).toThrow("must be range parameters");
			expect(() => environmentalSpace({ parameterDistributions: [distribution(["T"]), distribution(["z"])] })).toThrow(
				"Distribution over `z`, which is neither a parameter nor an environmental variable.",
			);
		});

		it("should reject mixed perturbation polarity", () => {
			expect(
				() =>
					new RobustSearchSpace({
						parameters: [range("x"), range("y")],
						parameterDistributions: [distribution(["x"], false), distribution(["y"], true)],
						numSamples: 2,
					}),
			).toThrow(UnsupportedOperationError);
		});

		it("should expose a shared polarity", () => {
			const space = new RobustSearchSpace({
				parameters: [range("x"), range("y")],
				parameterDistributions: [distribution(["x"], true), distribution(["y"], true)],
				numSamples: 2,
			});

			expect(space.multiplicative).toBe(true);
			expect(space.environmentalDistributions).toEqual([]);
		});
	});

	describe("mutation and copies", () => {
		it("should refuse to update parameters", () => {
			expect(() => environmentalSpace().updateParameter(range("x", 2))).toThrow(UnsupportedOperationError);
		});

		it("should not add a parameter named like an environmental variable", () => {
			const space = environmentalSpace();

			expect(() => space.addParameter(range("T", 6))).toThrow(
				"Parameter `T` already exists in search space. Use `updateParameter` to update an existing parameter.",
			);
			space.addParameter(range("z"));
			expect(Object.keys(space.parameters)).toEqual(["x", "z", "T"]);
		});

		it("should clone into an equal space", () => {
			const space = environmentalSpace();
			const copy = space.clone();

			expect(copy.equals(space)).toBe(true);
			expect(copy.numSamples).toBe(4);
			expect(copy.isEnvironmentalVariable("T")).toBe(true);
		});
	});
});
