/**
 * Error types for the paramspace packages.
 *
 * @module @paramspace/common/errors
 */

export { ParamspaceError } from "./base";
export type { ErrorCode } from "./domain";
export {
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
