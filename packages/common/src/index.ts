/**
 * @paramspace/common - Shared errors and utilities for the paramspace packages.
 *
 * @example
 * ```ts
 * import { envBool, hashObject } from "@paramspace/common";
 * import { ParameterValueError, SearchSpaceDefinitionError } from "@paramspace/common";
 * ```
 *
 * @module @paramspace/common
 */

// =============================================================================
// Utils
// =============================================================================

export { envBool, envEnum, envStr, hashObject, sha256Hash, stableStringify } from "./utils";

// =============================================================================
// Errors
// =============================================================================

export type { ErrorCode } from "./errors";
export {
	ConstraintViolationError,
	ErrorCodes,
	HierarchyStructureError,
	HierarchyViolationError,
	ParamspaceError,
	ParameterizationTypeError,
	ParameterValueError,
	SearchSpaceConfigError,
	SearchSpaceDefinitionError,
	UnsupportedOperationError,
} from "./errors";
