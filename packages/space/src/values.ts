import { ParameterValueError } from "@paramspace/common";
import { INT_TOLERANCE } from "./constants";
import type { ParameterType, ParameterValue } from "./types";

/**
 * Runtime type name of a value, using the same vocabulary as `ParameterType`.
 * Integral numbers report "int"; `null` reports "null".
 */
export function valueTypeOf(value: ParameterValue): ParameterType | "null" {
	if (value === null) return "null";
	switch (typeof value) {
		case "number":
			return Number.isInteger(value) ? "int" : "float";
		case "string":
			return "string";
		default:
			return "bool";
	}
}

export function isNumericType(parameterType: ParameterType): boolean {
	return parameterType === "int" || parameterType === "float";
}

function isNearInteger(value: number): boolean {
	return Math.abs(value - Math.round(value)) <= INT_TOLERANCE;
}

/**
 * Permissive type check: ints and floats are interchangeable as long as an
 * int-typed value is integral up to `INT_TOLERANCE`.
 */
export function isValidValueType(parameterType: ParameterType, value: ParameterValue): boolean {
	switch (parameterType) {
		case "int":
			return typeof value === "number" && Number.isFinite(value) && isNearInteger(value);
		case "float":
			return typeof value === "number" && Number.isFinite(value);
		case "string":
			return typeof value === "string";
		case "bool":
			return typeof value === "boolean";
	}
}

/**
 * Exact type check: int-typed values must be true integers.
 */
export function matchesValueType(parameterType: ParameterType, value: ParameterValue): boolean {
	if (parameterType === "int") {
		return typeof value === "number" && Number.isInteger(value);
	}
	return isValidValueType(parameterType, value);
}

function toNumber(value: string | number | boolean): number {
	if (typeof value === "boolean") return value ? 1 : 0;
	return typeof value === "number" ? value : Number(value);
}

/**
 * Cast a value to a parameter type. `null` passes through.
 *
 * Int casting snaps values within `INT_TOLERANCE` of an integer and truncates
 * everything else toward zero.
 *
 * @throws {ParameterValueError} when the value has no numeric reading for a numeric type
 */
export function castValue(parameterType: ParameterType, value: ParameterValue): ParameterValue {
	if (value === null) return null;
	switch (parameterType) {
		case "int": {
			const num = toNumber(value);
			if (!Number.isFinite(num)) {
				throw new ParameterValueError(`Cannot cast ${JSON.stringify(value)} to int.`, undefined, { value });
			}
			return isNearInteger(num) ? Math.round(num) : Math.trunc(num);
		}
		case "float": {
			const num = toNumber(value);
			if (Number.isNaN(num)) {
				throw new ParameterValueError(`Cannot cast ${JSON.stringify(value)} to float.`, undefined, { value });
			}
			return num;
		}
		case "string":
			return String(value);
		case "bool":
			if (typeof value === "string") {
				const lowered = value.trim().toLowerCase();
				return lowered === "true" || lowered === "1";
			}
			return typeof value === "number" ? value !== 0 : value;
	}
}

/**
 * Render a value for diagnostics: strings quoted, everything else bare.
 */
export function formatValue(value: ParameterValue): string {
	return typeof value === "string" ? `'${value}'` : String(value);
}
