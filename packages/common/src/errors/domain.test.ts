/**
 * Tests for @paramspace/common/errors/domain
 */

import { describe, expect, it } from "vitest";
import { ParamspaceError } from "./base";
import {
	ConstraintViolationError,
	ErrorCodes,
	HierarchyStructureError,
	HierarchyViolationError,
	ParameterizationTypeError,
	ParameterValueError,
	SearchSpaceConfigError,
	SearchSpaceDefinitionError,
	UnsupportedOperationError,
} from "./domain";

describe("ErrorCodes", () => {
	it("should export all error codes", () => {
		expect(ErrorCodes.SEARCH_SPACE_DEFINITION_INVALID).toBe("SEARCH_SPACE_DEFINITION_INVALID");
		expect(ErrorCodes.SEARCH_SPACE_CONFIG_INVALID).toBe("SEARCH_SPACE_CONFIG_INVALID");
		expect(ErrorCodes.PARAMETER_VALUE_INVALID).toBe("PARAMETER_VALUE_INVALID");
		expect(ErrorCodes.PARAMETER_TYPE_MISMATCH).toBe("PARAMETER_TYPE_MISMATCH");
		expect(ErrorCodes.CONSTRAINT_VIOLATED).toBe("CONSTRAINT_VIOLATED");
		expect(ErrorCodes.HIERARCHY_STRUCTURE_INVALID).toBe("HIERARCHY_STRUCTURE_INVALID");
		expect(ErrorCodes.HIERARCHY_VIOLATION).toBe("HIERARCHY_VIOLATION");
		expect(ErrorCodes.UNSUPPORTED_OPERATION).toBe("UNSUPPORTED_OPERATION");
	});
});

describe("SearchSpaceDefinitionError", () => {
	it("should carry the involved parameter names", () => {
		// Act
		const error = new SearchSpaceDefinitionError("Parameter names must be unique.", ["x1"]);

		// Assert
		expect(error.message).toBe("Parameter names must be unique.");
		expect(error.code).toBe(ErrorCodes.SEARCH_SPACE_DEFINITION_INVALID);
		expect(error.name).toBe("SearchSpaceDefinitionError");
		expect(error.parameterNames).toEqual(["x1"]);
	});

	it("should default to no parameter names", () => {
		const error = new SearchSpaceDefinitionError("bad");
		expect(error.parameterNames).toEqual([]);
	});

	it("should serialize parameter names", () => {
		const json = new SearchSpaceDefinitionError("bad", ["a", "b"]).toJSON();
		expect(json.parameterNames).toEqual(["a", "b"]);
		expect(json.code).toBe("SEARCH_SPACE_DEFINITION_INVALID");
	});
});

describe("ParameterValueError", () => {
	it("should carry parameter name and value", () => {
		// Act
		const error = new ParameterValueError("2 is not a valid value", "x", { value: 2 });

		// Assert
		expect(error.code).toBe(ErrorCodes.PARAMETER_VALUE_INVALID);
		expect(error.parameterName).toBe("x");
		expect(error.value).toBe(2);
		expect(error.toJSON()).toMatchObject({ parameterName: "x", value: 2 });
	});

	it("should chain a cause", () => {
		const cause = new Error("root");
		const error = new ParameterValueError("bad", undefined, { cause });
		expect(error.cause).toBe(cause);
		expect(error.toJSON()).toMatchObject({ cause: { name: "Error", message: "root" } });
	});
});

describe("ConstraintViolationError", () => {
	it("should carry the constraint rendering", () => {
		const error = new ConstraintViolationError("violated", "1.0*x1 + 1.0*x2 <= 1");
		expect(error.constraint).toBe("1.0*x1 + 1.0*x2 <= 1");
		expect(error.code).toBe(ErrorCodes.CONSTRAINT_VIOLATED);
		expect(error.toJSON().constraint).toBe("1.0*x1 + 1.0*x2 <= 1");
	});
});

describe("HierarchyStructureError", () => {
	it("should carry offending names", () => {
		const error = new HierarchyStructureError("two roots", ["a", "b"]);
		expect(error.name).toBe("HierarchyStructureError");
		expect(error.parameterNames).toEqual(["a", "b"]);
		expect(error.code).toBe(ErrorCodes.HIERARCHY_STRUCTURE_INVALID);
	});
});

describe("HierarchyViolationError", () => {
	it("should carry the tree rendering", () => {
		const error = new HierarchyViolationError("missing", "model\n\t(A)\n");
		expect(error.structure).toBe("model\n\t(A)\n");
		expect(error.code).toBe(ErrorCodes.HIERARCHY_VIOLATION);
	});
});

describe("UnsupportedOperationError", () => {
	it("should carry the operation", () => {
		const error = new UnsupportedOperationError("nope", "updateParameter");
		expect(error.operation).toBe("updateParameter");
		expect(error.toJSON().operation).toBe("updateParameter");
	});
});

describe("ParameterizationTypeError", () => {
	it("should carry expected and received types", () => {
		const error = new ParameterizationTypeError("wrong type", "n", "int", "float");
		expect(error.parameterName).toBe("n");
		expect(error.expected).toBe("int");
		expect(error.received).toBe("float");
		expect(error.toJSON()).toMatchObject({ parameterName: "n", expected: "int", received: "float" });
	});
});

describe("SearchSpaceConfigError", () => {
	it("should carry issue paths", () => {
		const error = new SearchSpaceConfigError("invalid config", ["parameters.0.lower"]);
		expect(error.issues).toEqual(["parameters.0.lower"]);
		expect(error.code).toBe(ErrorCodes.SEARCH_SPACE_CONFIG_INVALID);
	});
});

describe("inheritance", () => {
	it("should make every domain error a ParamspaceError", () => {
		const errors = [
			new SearchSpaceDefinitionError("a"),
			new ParameterValueError("b"),
			new ConstraintViolationError("c", "x <= 1"),
			new HierarchyStructureError("d"),
			new HierarchyViolationError("e", ""),
			new UnsupportedOperationError("f"),
			new ParameterizationTypeError("g", "x", "int", "string"),
			new SearchSpaceConfigError("h"),
		];
		for (const error of errors) {
			expect(error).toBeInstanceOf(ParamspaceError);
			expect(error).toBeInstanceOf(Error);
		}
	});
});
