import { ParameterValueError, SearchSpaceDefinitionError, UnsupportedOperationError } from "@paramspace/common";
import { describe, expect, it } from "vitest";
import { createRobustSearchSpaceDigest, extractRobustDigest, extractSearchSpaceDigest } from "./digest";
import { ParameterDistribution } from "./distribution";
import { ChoiceParameter, FixedParameter, RangeParameter } from "./parameter";
import { RobustSearchSpace } from "./robust";
import { SearchSpace } from "./search-space";

function mixedSpace(): SearchSpace {
	return new SearchSpace([
		new RangeParameter({ name: "a", parameterType: "float", lower: 0, upper: 1 }),
		new RangeParameter({ name: "b", parameterType: "int", lower: 1, upper: 3 }),
		new ChoiceParameter({ name: "c", parameterType: "int", values: [1, 2, 4] }),
		new ChoiceParameter({ name: "d", parameterType: "int", values: [0, 1, 2], isOrdered: false }),
		new ChoiceParameter({ name: "e", parameterType: "int", values: [0, 1], isOrdered: false, isTask: true, targetValue: 0 }),
		new RangeParameter({ name: "f", parameterType: "float", lower: 0, upper: 1, isFidelity: true, targetValue: 1 }),
	]);
}

function range(name: string, upper = 1): RangeParameter {
	return new RangeParameter({ name, parameterType: "float", lower: 0, upper });
}

function robustSpace(multiplicative: boolean): RobustSearchSpace {
	return new RobustSearchSpace({
		parameters: [range("x"), range("y")],
		parameterDistributions: [
			new ParameterDistribution({
				parameters: ["x"],
				distribution: { name: "uniform", low: 0, high: 4 },
				multiplicative,
			}),
			new ParameterDistribution({ parameters: ["T"], distribution: { name: "uniform", low: 0, high: 100 } }),
		],
		numSamples: 2,
		environmentalVariables: [range("T", 100)],
	});
}

describe("extractSearchSpaceDigest", () => {
	it("should index bounds and feature kinds in the requested order", () => {
		const digest = extractSearchSpaceDigest(mixedSpace(), ["a", "b", "c", "d", "e", "f"]);

		expect(digest.featureNames).toEqual(["a", "b", "c", "d", "e", "f"]);
		expect(digest.bounds).toEqual([
			[0, 1],
			[1, 3],
			[1, 4],
			[0, 2],
			[0, 1],
			[0, 1],
		]);
		expect(digest.ordinalFeatures).toEqual([1, 2]);
		expect(digest.categoricalFeatures).toEqual([3]);
		expect(digest.taskFeatures).toEqual([4]);
		expect(digest.fidelityFeatures).toEqual([5]);
		expect(digest.targetValues).toEqual(
			new Map([
				[4, 0],
				[5, 1],
			]),
		);
		expect(digest.discreteChoices).toEqual(
			new Map([
				[1, [1, 2, 3]],
				[2, [1, 2, 4]],
				[3, [0, 1, 2]],
				[4, [0, 1]],
			]),
		);
		expect(digest.robustDigest).toBeUndefined();
	});

	it("should be frozen", () => {
		const digest = extractSearchSpaceDigest(mixedSpace(), ["a"]);

		expect(Object.isFrozen(digest)).toBe(true);
		expect(Object.isFrozen(digest.featureNames)).toBe(true);
	});

	it("should reject parameters a model cannot take as they are", () => {
		const space = new SearchSpace([
			new FixedParameter({ name: "seed", parameterType: "int", value: 1 }),
			new RangeParameter({ name: "lr", parameterType: "float", lower: 0.001, upper: 1, logScale: true }),
			new ChoiceParameter({ name: "opt", parameterType: "string", values: ["adam", "sgd"] }),
		]);

		expect(() => extractSearchSpaceDigest(space, ["seed"])).toThrow(UnsupportedOperationError);
		expect(() => extractSearchSpaceDigest(space, ["lr"])).toThrow("is on a log or logit scale");
		expect(() => extractSearchSpaceDigest(space, ["opt"])).toThrow("has non-numeric values");
		expect(() => extractSearchSpaceDigest(space, ["ghost"])).toThrow(ParameterValueError);
	});

	it("should attach a robust digest for robust spaces", () => {
		const digest = extractSearchSpaceDigest(robustSpace(false), ["x", "y", "T"], { random: () => 0.5 });

		expect(digest.robustDigest?.environmentalVariables).toEqual(["T"]);
		expect(digest.bounds).toEqual([
			[0, 1],
			[0, 1],
			[0, 100],
		]);
	});
});

describe("extractRobustDigest", () => {
	it("should sample additive perturbations around zero", () => {
		const digest = extractRobustDigest(robustSpace(false), ["x", "y", "T"], { random: () => 0.5 });

		expect(digest.multiplicative).toBe(false);
		expect(digest.sampleParamPerturbations?.()).toEqual([
			[2, 0],
			[2, 0],
		]);
		expect(digest.sampleEnvironmental?.()).toEqual([[50], [50]]);
	});

	it("should fill unperturbed features with one when multiplicative", () => {
		const digest = extractRobustDigest(robustSpace(true), ["x", "y", "T"], { random: () => 0.5 });

		expect(digest.multiplicative).toBe(true);
		expect(digest.sampleParamPerturbations?.()).toEqual([
			[2, 1],
			[2, 1],
		]);
	});

	it("should require environmental variables to come last", () => {
		expect(() => extractRobustDigest(robustSpace(false), ["T", "x", "y"])).toThrow(
			"Environmental variables must be the last entries of the feature names.",
		);
	});

	it("should omit samplers without distributions", () => {
		const space = new RobustSearchSpace({
			parameters: [range("x")],
			parameterDistributions: [
				new ParameterDistribution({ parameters: ["x"], distribution: { name: "normal", loc: 0, scale: 1 } }),
			],
			numSamples: 1,
		});

		const digest = extractRobustDigest(space, ["x"]);

		expect(digest.sampleParamPerturbations).toBeDefined();
		expect(digest.sampleEnvironmental).toBeUndefined();
		expect(digest.environmentalVariables).toEqual([]);
	});
});

describe("createRobustSearchSpaceDigest", () => {
	it("should require at least one sampler", () => {
		expect(() => createRobustSearchSpaceDigest({ environmentalVariables: ["T"] })).toThrow(SearchSpaceDefinitionError);
	});
});
