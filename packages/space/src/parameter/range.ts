import { SearchSpaceDefinitionError } from "@paramspace/common";
import { NUMERIC_TOLERANCE } from "../constants";
import type { ParameterValue } from "../types";
import { BaseParameter, type ParameterSummary } from "./base";

export interface RangeParameterOptions {
	name: string;
	parameterType: "int" | "float";
	lower: number;
	upper: number;
	logScale?: boolean;
	logitScale?: boolean;
	/** Round cast values to this many decimal digits. */
	digits?: number;
	isFidelity?: boolean;
	targetValue?: number;
}

/**
 * Numeric parameter over the closed interval [lower, upper].
 */
export class RangeParameter extends BaseParameter {
	readonly kind = "range" as const;
	readonly lower: number;
	readonly upper: number;
	readonly logScale: boolean;
	readonly logitScale: boolean;
	readonly digits: number | undefined;

	constructor(options: RangeParameterOptions) {
		super(options.name, options.parameterType, {
			isFidelity: options.isFidelity,
			targetValue: options.targetValue,
		});
		this.lower = options.lower;
		this.upper = options.upper;
		this.logScale = options.logScale ?? false;
		this.logitScale = options.logitScale ?? false;
		this.digits = options.digits;
		this.validateBounds();
		if (this.targetValue !== undefined && !this.validate(this.targetValue)) {
			throw new SearchSpaceDefinitionError(
				`Target value ${this.targetValue} of parameter \`${this.name}\` is outside [${this.lower}, ${this.upper}].`,
				[this.name],
			);
		}
	}

	private validateBounds(): void {
		const { name, lower, upper } = this;
		if (!Number.isFinite(lower) || !Number.isFinite(upper)) {
			throw new SearchSpaceDefinitionError(`Bounds of parameter \`${name}\` must be finite.`, [name]);
		}
		if (lower >= upper) {
			throw new SearchSpaceDefinitionError(
				`Upper bound of parameter \`${name}\` must be strictly larger than lower; got lower=${lower}, upper=${upper}.`,
				[name],
			);
		}
		if (this.parameterType === "int" && (!Number.isInteger(lower) || !Number.isInteger(upper))) {
			throw new SearchSpaceDefinitionError(`Bounds of int parameter \`${name}\` must be integers.`, [name]);
		}
		if (this.logScale && this.logitScale) {
			throw new SearchSpaceDefinitionError(`Parameter \`${name}\` cannot be both log and logit scale.`, [name]);
		}
		if (this.logScale && lower <= 0) {
			throw new SearchSpaceDefinitionError(`Log-scale parameter \`${name}\` needs a positive lower bound.`, [name]);
		}
		if (this.logitScale && (lower <= 0 || upper >= 1)) {
			throw new SearchSpaceDefinitionError(`Logit-scale parameter \`${name}\` needs bounds inside (0, 1).`, [name]);
		}
	}

	validate(value: ParameterValue): boolean {
		if (value === null || !this.isValidType(value)) {
			return false;
		}
		const num = Number(value);
		return num >= this.lower - NUMERIC_TOLERANCE && num <= this.upper + NUMERIC_TOLERANCE;
	}

	override cast(value: ParameterValue): ParameterValue {
		const cast = super.cast(value);
		if (typeof cast === "number" && this.digits !== undefined && this.parameterType === "float") {
			return Number(cast.toFixed(this.digits));
		}
		return cast;
	}

	get domainRepr(): string {
		return `range=[${this.lower}, ${this.upper}]`;
	}

	protected get summaryType(): ParameterSummary["type"] {
		return "Range";
	}

	protected override get flags(): string[] {
		const flags = super.flags;
		if (this.logScale) flags.push("log_scale");
		if (this.logitScale) flags.push("logit_scale");
		return flags;
	}

	clone(): RangeParameter {
		return new RangeParameter({
			name: this.name,
			parameterType: this.parameterType === "int" ? "int" : "float",
			lower: this.lower,
			upper: this.upper,
			logScale: this.logScale,
			logitScale: this.logitScale,
			digits: this.digits,
			isFidelity: this.isFidelity,
			targetValue: typeof this.targetValue === "number" ? this.targetValue : undefined,
		});
	}
}
