import { SearchSpaceConfigError, SearchSpaceDefinitionError } from "@paramspace/common";
import { describe, expect, it } from "vitest";
import { parseSearchSpaceConfig } from "./config";
import { HierarchicalSearchSpace } from "./hierarchical";
import { RobustSearchSpace } from "./robust";

function issuesOf(input: unknown): readonly string[] {
	try {
		parseSearchSpaceConfig(input);
	} catch (error) {
		if (error instanceof SearchSpaceConfigError) return error.issues;
		throw error;
	}
	throw new Error("expected the config to be rejected");
}

describe("parseSearchSpaceConfig", () => {
	it("should build a flat space with constraints", () => {
		const space = parseSearchSpaceConfig({
			parameters: [
				{ type: "range", name: "x1", lower: 0, upper: 1 },
				{ type: "range", name: "x2", lower: 0, upper: 1 },
			],
			parameterConstraints: [{ type: "sum", parameters: ["x1", "x2"], bound: 1 }],
		});

		expect(space.isHierarchical).toBe(false);
		expect(space.getParameter("x1").parameterType).toBe("float");
		expect(space.parameterConstraints.map(String)).toEqual(["SumConstraint(x1 + x2 <= 1)"]);
		expect(space.checkMembership({ x1: 0.4, x2: 0.4 })).toBe(true);
		expect(space.checkMembership({ x1: 0.7, x2: 0.7 })).toBe(false);
	});

	it("should infer choice and fixed value types", () => {
		const space = parseSearchSpaceConfig({
			parameters: [
				{ type: "choice", name: "k", values: [1, 2, 3] },
				{ type: "choice", name: "rate", values: [0.5, 1] },
				{ type: "choice", name: "opt", values: ["adam", "sgd"] },
				{ type: "choice", name: "flag", values: [true, false] },
				{ type: "fixed", name: "seed", value: 7 },
			],
		});

		expect(Object.values(space.parameters).map((p) => p.parameterType)).toEqual([
			"int",
			"float",
			"string",
			"bool",
			"int",
		]);
	});

	it("should build order and linear constraints", () => {
		const space = parseSearchSpaceConfig({
			parameters: [
				{ type: "range", name: "a", lower: 0, upper: 1 },
				{ type: "range", name: "b", lower: 0, upper: 1 },
			],
			parameterConstraints: [
				{ type: "order", lower: "a", upper: "b" },
				{ type: "linear", coefficients: { a: 2, b: 1 }, bound: 2 },
			],
		});

		expect(space.parameterConstraints.map(String)).toEqual([
			"OrderConstraint(a <= b)",
			"ParameterConstraint(2*a + 1*b <= 2)",
		]);
	});

	it("should build a hierarchical space with typed dependents keys", () => {
		const space = parseSearchSpaceConfig({
			hierarchical: true,
			parameters: [
				{ type: "choice", name: "layers", values: [1, 2], dependents: { "2": ["width"] } },
				{ type: "range", name: "width", parameterType: "int", lower: 8, upper: 64 },
			],
		});

		expect(space).toBeInstanceOf(HierarchicalSearchSpace);
		expect(space.getParameter("layers").dependents.get(2)).toEqual(["width"]);
		expect(space.checkMembership({ layers: 1 })).toBe(true);
	});

	it("should build a robust space", () => {
		const space = parseSearchSpaceConfig({
			parameters: [{ type: "range", name: "x", lower: 0, upper: 1 }],
			robust: {
				numSamples: 8,
				environmentalVariables: [{ type: "range", name: "T", lower: 0, upper: 100 }],
				distributions: [
					{ parameters: ["T"], distribution: { name: "uniform", low: 0, high: 100 } },
					{ parameters: ["x"], distribution: { name: "normal", loc: 0, scale: 0.1 } },
				],
			},
		});

		expect(space).toBeInstanceOf(RobustSearchSpace);
		expect(space instanceof RobustSearchSpace && space.isEnvironmentalVariable("T")).toBe(true);
	});

	it("should report the paths of malformed fields", () => {
		expect(issuesOf({ parameters: [{ type: "range", name: "x", lower: "a", upper: 1 }] })).toEqual([
			"parameters.0.lower",
		]);
		expect(issuesOf({ parameters: [{ type: "bogus", name: "x" }] })).toEqual(["parameters.0.type"]);
		expect(issuesOf({ parameters: [] })).toEqual(["parameters"]);
	});

	it("should reject a space that is both hierarchical and robust", () => {
		expect(
			issuesOf({
				hierarchical: true,
				parameters: [{ type: "range", name: "x", lower: 0, upper: 1 }],
				robust: {
					numSamples: 1,
					distributions: [{ parameters: ["x"], distribution: { name: "normal", loc: 0, scale: 1 } }],
				},
			}),
		).toEqual(["robust"]);
	});

	it("should reject references to unknown parameters", () => {
		expect(
			issuesOf({
				parameters: [{ type: "range", name: "a", lower: 0, upper: 1 }],
				parameterConstraints: [{ type: "order", lower: "a", upper: "b" }],
			}),
		).toEqual(["parameterConstraints.0.upper"]);
		expect(
			issuesOf({
				hierarchical: true,
				parameters: [{ type: "choice", name: "m", values: ["A", "B"], dependents: { C: ["x"] } }],
			}),
		).toEqual(["parameters.0.dependents.C"]);
	});

	it("should leave definition errors to the search space", () => {
		expect(() => parseSearchSpaceConfig({ parameters: [{ type: "range", name: "x", lower: 1, upper: 0 }] })).toThrow(
			SearchSpaceDefinitionError,
		);
	});
});
