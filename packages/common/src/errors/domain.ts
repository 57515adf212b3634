/**
 * Domain-specific error classes for search space definition and validation.
 *
 * Each class maps to one failure kind: a bad definition, a value outside a
 * parameter's domain, a violated linear constraint, a broken hierarchy, an
 * unsupported operation, or a value of the wrong runtime type.
 *
 * @module @paramspace/common/errors/domain
 */

import { ParamspaceError } from "./base";

/**
 * Error codes for domain errors.
 */
export const ErrorCodes = {
	// Definition
	SEARCH_SPACE_DEFINITION_INVALID: "SEARCH_SPACE_DEFINITION_INVALID",
	SEARCH_SPACE_CONFIG_INVALID: "SEARCH_SPACE_CONFIG_INVALID",

	// Membership
	PARAMETER_VALUE_INVALID: "PARAMETER_VALUE_INVALID",
	PARAMETER_TYPE_MISMATCH: "PARAMETER_TYPE_MISMATCH",
	CONSTRAINT_VIOLATED: "CONSTRAINT_VIOLATED",

	// Hierarchy
	HIERARCHY_STRUCTURE_INVALID: "HIERARCHY_STRUCTURE_INVALID",
	HIERARCHY_VIOLATION: "HIERARCHY_VIOLATION",

	// Configuration-level
	UNSUPPORTED_OPERATION: "UNSUPPORTED_OPERATION",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Error for invalid search space definitions.
 *
 * Thrown for duplicate parameter names, constraints that reference unknown
 * parameters, or parameter definitions that disagree with the space.
 *
 * @example
 * ```ts
 * throw new SearchSpaceDefinitionError("Parameter names must be unique.", ["x1"]);
 * ```
 */
export class SearchSpaceDefinitionError extends ParamspaceError {
	/**
	 * Names of the parameters involved.
	 */
	public readonly parameterNames: readonly string[];

	constructor(message: string, parameterNames: readonly string[] = [], cause?: Error) {
		super(message, ErrorCodes.SEARCH_SPACE_DEFINITION_INVALID, cause);
		this.name = "SearchSpaceDefinitionError";
		this.parameterNames = parameterNames;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			parameterNames: this.parameterNames,
		};
	}
}

/**
 * Error for a value that falls outside a parameter's domain, or a
 * parameterization whose keys do not match the search space.
 */
export class ParameterValueError extends ParamspaceError {
	/**
	 * The parameter that rejected the value, when there is a single one.
	 */
	public readonly parameterName?: string;

	/**
	 * The rejected value.
	 */
	public readonly value?: unknown;

	constructor(message: string, parameterName?: string, options?: { value?: unknown; cause?: Error }) {
		super(message, ErrorCodes.PARAMETER_VALUE_INVALID, options?.cause);
		this.name = "ParameterValueError";
		this.parameterName = parameterName;
		this.value = options?.value;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			parameterName: this.parameterName,
			value: this.value,
		};
	}
}

/**
 * Error for a parameterization that violates a linear parameter constraint.
 *
 * @example
 * ```ts
 * throw new ConstraintViolationError("Parameter constraint x1 + x2 <= 1 is violated.", "x1 + x2 <= 1");
 * ```
 */
export class ConstraintViolationError extends ParamspaceError {
	/**
	 * Text rendering of the violated constraint.
	 */
	public readonly constraint: string;

	constructor(message: string, constraint: string) {
		super(message, ErrorCodes.CONSTRAINT_VIOLATED);
		this.name = "ConstraintViolationError";
		this.constraint = constraint;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			constraint: this.constraint,
		};
	}
}

/**
 * Error for hierarchical search spaces that do not form a single tree.
 */
export class HierarchyStructureError extends ParamspaceError {
	/**
	 * Parameters that caused the failure (extra roots, shared or unreachable names).
	 */
	public readonly parameterNames: readonly string[];

	constructor(message: string, parameterNames: readonly string[] = []) {
		super(message, ErrorCodes.HIERARCHY_STRUCTURE_INVALID);
		this.name = "HierarchyStructureError";
		this.parameterNames = parameterNames;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			parameterNames: this.parameterNames,
		};
	}
}

/**
 * Error for a parameterization that does not fit a hierarchical search space:
 * an applicable parameter is missing, or inapplicable parameters are present.
 *
 * The message embeds the parameterization and the tree rendering.
 */
export class HierarchyViolationError extends ParamspaceError {
	/**
	 * Text rendering of the hierarchy the parameterization was checked against.
	 */
	public readonly structure: string;

	constructor(message: string, structure: string) {
		super(message, ErrorCodes.HIERARCHY_VIOLATION);
		this.name = "HierarchyViolationError";
		this.structure = structure;
	}
}

/**
 * Error for operations a search space does not support.
 *
 * @example
 * ```ts
 * throw new UnsupportedOperationError("RobustSearchSpace does not support `updateParameter`.", "updateParameter");
 * ```
 */
export class UnsupportedOperationError extends ParamspaceError {
	/**
	 * The operation that was refused.
	 */
	public readonly operation?: string;

	constructor(message: string, operation?: string) {
		super(message, ErrorCodes.UNSUPPORTED_OPERATION);
		this.name = "UnsupportedOperationError";
		this.operation = operation;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			operation: this.operation,
		};
	}
}

/**
 * Error for a value whose runtime type differs from the parameter's declared
 * value type.
 */
export class ParameterizationTypeError extends ParamspaceError {
	public readonly parameterName: string;

	/**
	 * Declared value type of the parameter.
	 */
	public readonly expected: string;

	/**
	 * Runtime type of the offending value.
	 */
	public readonly received: string;

	constructor(message: string, parameterName: string, expected: string, received: string) {
		super(message, ErrorCodes.PARAMETER_TYPE_MISMATCH);
		this.name = "ParameterizationTypeError";
		this.parameterName = parameterName;
		this.expected = expected;
		this.received = received;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			parameterName: this.parameterName,
			expected: this.expected,
			received: this.received,
		};
	}
}

/**
 * Error for search space configuration objects that fail schema validation.
 */
export class SearchSpaceConfigError extends ParamspaceError {
	/**
	 * Paths of the offending fields, dot-joined (e.g. "parameters.0.lower").
	 */
	public readonly issues: readonly string[];

	constructor(message: string, issues: readonly string[] = [], cause?: Error) {
		super(message, ErrorCodes.SEARCH_SPACE_CONFIG_INVALID, cause);
		this.name = "SearchSpaceConfigError";
		this.issues = issues;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			issues: this.issues,
		};
	}
}
