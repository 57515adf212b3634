import { SearchSpaceDefinitionError } from "@paramspace/common";
import type { Parameter } from "../parameter";

/** Resolves a parameter name to the instance owned by a search space. */
export type ParameterLookup = (name: string) => Parameter;

/**
 * @throws {SearchSpaceDefinitionError} when a parameter is not numeric
 */
export function requireNumeric(parameters: readonly Parameter[]): void {
	if (parameters.length === 0) {
		throw new SearchSpaceDefinitionError("Parameter constraint must reference at least one parameter.");
	}
	for (const parameter of parameters) {
		if (!parameter.isNumeric) {
			throw new SearchSpaceDefinitionError(
				`Parameter constraints only support numeric parameters; \`${parameter.name}\` is ${parameter.parameterType}.`,
				[parameter.name],
			);
		}
	}
}
