import { SearchSpaceDefinitionError } from "@paramspace/common";
import type { RandomSource } from "./types";

/**
 * Distribution families, with per-parameter arguments. A scalar argument is
 * broadcast over every parameter the distribution covers.
 */
export type DistributionSpec =
	| { name: "normal"; loc: number | readonly number[]; scale: number | readonly number[] }
	| { name: "uniform"; low: number | readonly number[]; high: number | readonly number[] }
	| { name: "lognormal"; mu: number | readonly number[]; sigma: number | readonly number[] };

export interface ParameterDistributionOptions {
	parameters: readonly string[];
	distribution: DistributionSpec;
	/** Perturbations scale the value instead of shifting it. */
	multiplicative?: boolean;
}

/**
 * Probability distribution over one or more parameters, describing either
 * environmental variables or input perturbations.
 */
export class ParameterDistribution {
	readonly parameters: readonly string[];
	readonly distribution: DistributionSpec;
	readonly multiplicative: boolean;

	constructor(options: ParameterDistributionOptions) {
		if (options.parameters.length === 0) {
			throw new SearchSpaceDefinitionError("A parameter distribution must cover at least one parameter.");
		}
		if (new Set(options.parameters).size !== options.parameters.length) {
			throw new SearchSpaceDefinitionError(
				"Parameters of a distribution must be unique.",
				options.parameters,
			);
		}
		this.parameters = [...options.parameters];
		this.distribution = options.distribution;
		this.multiplicative = options.multiplicative ?? false;
		this.validateArguments();
	}

	private validateArguments(): void {
		const spec = this.distribution;
		const [first, second] = argumentsOf(spec);
		for (const arg of [first, second]) {
			if (Array.isArray(arg) && arg.length !== this.parameters.length) {
				throw new SearchSpaceDefinitionError(
					`Distribution arguments must be scalars or have one entry per parameter (${this.parameters.length}).`,
					this.parameters,
				);
			}
		}
		for (let i = 0; i < this.parameters.length; i++) {
			const a = at(first, i);
			const b = at(second, i);
			if (!Number.isFinite(a) || !Number.isFinite(b)) {
				throw new SearchSpaceDefinitionError("Distribution arguments must be finite.", this.parameters);
			}
			if (spec.name === "uniform" ? a >= b : b <= 0) {
				throw new SearchSpaceDefinitionError(
					spec.name === "uniform"
						? "Uniform distribution needs low < high."
						: `The ${spec.name} distribution needs a positive spread.`,
					this.parameters,
				);
			}
		}
	}

	/**
	 * Draw `n` joint samples; row `i` holds one value per covered parameter,
	 * in the order of `parameters`.
	 */
	sample(n: number, random: RandomSource = Math.random): number[][] {
		const spec = this.distribution;
		const [first, second] = argumentsOf(spec);
		const rows: number[][] = [];
		for (let row = 0; row < n; row++) {
			rows.push(
				this.parameters.map((_, i) => {
					const a = at(first, i);
					const b = at(second, i);
					switch (spec.name) {
						case "normal":
							return a + b * standardNormal(random);
						case "uniform":
							return a + (b - a) * random();
						case "lognormal":
							return Math.exp(a + b * standardNormal(random));
					}
				}),
			);
		}
		return rows;
	}

	clone(): ParameterDistribution {
		return new ParameterDistribution({
			parameters: this.parameters,
			distribution: this.distribution,
			multiplicative: this.multiplicative,
		});
	}

	toString(): string {
		return `ParameterDistribution(parameters=[${this.parameters.join(", ")}], distribution=${JSON.stringify(this.distribution)}, multiplicative=${this.multiplicative})`;
	}
}

type Argument = number | readonly number[];

function argumentsOf(spec: DistributionSpec): [Argument, Argument] {
	switch (spec.name) {
		case "normal":
			return [spec.loc, spec.scale];
		case "uniform":
			return [spec.low, spec.high];
		case "lognormal":
			return [spec.mu, spec.sigma];
	}
}

function at(arg: Argument, index: number): number {
	return typeof arg === "number" ? arg : (arg[index] ?? Number.NaN);
}

// Box-Muller; 1 - u keeps the log argument in (0, 1].
function standardNormal(random: RandomSource): number {
	const u = 1 - random();
	const v = random();
	return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}
