import { HierarchyStructureError, HierarchyViolationError, UnsupportedOperationError } from "@paramspace/common";
import { Arm } from "./arm";
import type { ParameterConstraint } from "./constraint";
import { componentLogger } from "./logger";
import type { ObservationFeatures } from "./observation";
import type { Parameter } from "./parameter";
import { type MembershipOptions, SearchSpace } from "./search-space";
import type { ParameterValue, Parameterization, RandomSource } from "./types";
import { formatValue } from "./values";

const logger = componentLogger("HierarchicalSearchSpace");

export interface FlattenOptions {
	/** Fill parameters that are still missing after restoring the full parameterization. */
	injectDummyValues?: boolean;
	/** Draw dummy values at random instead of taking domain midpoints. */
	useRandomDummyValues?: boolean;
	random?: RandomSource;
}

type ApplicableResult = { ok: true; names: Set<string> } | { ok: false; missing: string };

/**
 * Search space whose parameters form a tree: a hierarchical parameter names,
 * per value, the parameters that apply when it takes that value.
 *
 * Construction finds the single root and proves the dependency relation is a
 * tree (every parameter reached exactly once from the root).
 *
 * @example
 * ```ts
 * const model = new ChoiceParameter({
 *   name: "model",
 *   parameterType: "string",
 *   values: ["A", "B"],
 *   dependents: new Map([["A", ["lr"]]]),
 * });
 * const space = new HierarchicalSearchSpace([model, lr]);
 * space.castParameterization({ model: "B", lr: 0.1 }); // { model: "B" }
 * ```
 */
export class HierarchicalSearchSpace extends SearchSpace {
	private _root: Parameter;

	constructor(parameters: readonly Parameter[], parameterConstraints: readonly ParameterConstraint[] = []) {
		super(parameters, parameterConstraints);
		this._root = this.findRoot();
		this.validateHierarchicalStructure();
		logger.debug({ root: this._root.name }, "Found root");
	}

	override get isHierarchical(): boolean {
		return true;
	}

	/** The one parameter no other parameter depends on. */
	get root(): Parameter {
		return this._root;
	}

	/** Number of parameters on the longest dependency chain from the root. */
	get height(): number {
		const heightFrom = (parameter: Parameter): number => {
			if (!parameter.isHierarchical) return 1;
			let tallest = 0;
			for (const names of parameter.dependents.values()) {
				for (const name of names) {
					tallest = Math.max(tallest, heightFrom(this.getParameter(name)));
				}
			}
			return tallest + 1;
		};
		return heightFrom(this._root);
	}

	/** The tree is fixed at construction; a new parameter would have no place in it. */
	override addParameter(_parameter: Parameter): void {
		throw new UnsupportedOperationError(
			"HierarchicalSearchSpace does not support `addParameter`; construct a new space instead.",
			"addParameter",
		);
	}

	/**
	 * Replace a parameter's domain. Its place in the tree, meaning whether it
	 * is hierarchical and which dependents each value names, may not change.
	 */
	override updateParameter(parameter: Parameter): void {
		const previous = this.parameterMap.get(parameter.name);
		if (previous !== undefined && !sameDependents(previous, parameter)) {
			throw new UnsupportedOperationError(
				`Cannot change the dependents of parameter \`${parameter.name}\` in a HierarchicalSearchSpace.`,
				"updateParameter",
			);
		}
		super.updateParameter(parameter);
		if (parameter.name === this._root.name) {
			this._root = parameter;
		}
	}

	/** The same parameters and constraints as a plain search space. */
	flatten(): SearchSpace {
		return new SearchSpace(Object.values(this.parameters), this._parameterConstraints);
	}

	/**
	 * Restrict a parameterization to the parameters that apply given the
	 * values of their ancestors.
	 *
	 * With `checkAllParametersPresent`, a missing applicable parameter is an
	 * error; without it, a missing parameter just ends the descent into its
	 * subtree.
	 *
	 * @throws {HierarchyViolationError}
	 */
	castParameterization(parameters: Parameterization, checkAllParametersPresent = true): Parameterization {
		const result = this.resolveApplicable(parameters, checkAllParametersPresent);
		if (!result.ok) {
			throw this.violation(parameters, `Parameter '${result.missing}' not in parameterization to cast.`);
		}
		return Object.fromEntries(Object.entries(parameters).filter(([name]) => result.names.has(name)));
	}

	/**
	 * Cast values to their types, then drop parameters that do not apply.
	 */
	override castArm(arm: Arm): Arm {
		const cast = super.castArm(arm);
		return new Arm(this.castParameterization({ ...cast.parameters }), cast.name);
	}

	/**
	 * Flat membership of every supplied value, plus: the supplied names are
	 * exactly the applicable ones.
	 */
	override checkMembership(parameterization: Parameterization, options: MembershipOptions = {}): boolean {
		const { raiseError = false, checkAllParametersPresent = true } = options;
		if (!super.checkMembership(parameterization, { raiseError, checkAllParametersPresent: false })) {
			return false;
		}

		const result = this.resolveApplicable(parameterization, checkAllParametersPresent);
		if (!result.ok) {
			if (raiseError) {
				throw this.violation(parameterization, `Parameter '${result.missing}' not in parameterization to cast.`);
			}
			return false;
		}
		const supplied = Object.keys(parameterization);
		const inapplicable = supplied.filter((name) => !result.names.has(name));
		if (inapplicable.length > 0) {
			if (raiseError) {
				const applicable = supplied.filter((name) => result.names.has(name));
				throw this.violation(
					parameterization,
					`Cast version would have parameters: [${applicable.join(", ")}], but full version contains parameters: [${supplied.join(", ")}].`,
				);
			}
			return false;
		}
		return true;
	}

	protected override requiresValueFor(name: string, parameterization: Parameterization): boolean {
		return Object.hasOwn(parameterization, name);
	}

	/**
	 * Cast to the hierarchical shape, keeping the pre-cast parameterization
	 * in `fullParameterization`.
	 */
	castObservationFeatures(features: ObservationFeatures): ObservationFeatures {
		return features.clone({
			parameters: this.castParameterization({ ...features.parameters }, false),
			fullParameterization: { ...features.parameters },
		});
	}

	/**
	 * Undo `castObservationFeatures`: restore the recorded full
	 * parameterization underneath the current values, then optionally fill
	 * whatever is still missing with dummy values.
	 */
	flattenObservationFeatures(features: ObservationFeatures, options: FlattenOptions = {}): ObservationFeatures {
		const { injectDummyValues = false, useRandomDummyValues = false, random = Math.random } = options;
		const full = features.fullParameterization;
		if (Object.keys(features.parameters).length === 0 && full === undefined) {
			return features;
		}

		let parameters: Parameterization = { ...full, ...features.parameters };
		const missing = Object.keys(this.parameters).filter((name) => !Object.hasOwn(parameters, name));
		if (missing.length > 0) {
			if (injectDummyValues) {
				parameters = { ...this.dummyValues(missing, useRandomDummyValues, random), ...parameters };
			} else {
				logger.warn(
					{ missing, parameters },
					"Cannot fully flatten observation features: the full parameterization is not recorded and dummy value injection is off",
				);
			}
		}
		return features.clone({ parameters });
	}

	/**
	 * Indented rendering of the tree: value branches one tab deeper than
	 * their parameter, dependents one tab deeper than the branch.
	 */
	hierarchicalStructureStr(parameterNamesOnly = false): string {
		const render = (parameter: Parameter, level: number): string => {
			let out = `${"\t".repeat(level)}${parameterNamesOnly ? parameter.name : String(parameter)}\n`;
			if (parameter.isHierarchical) {
				for (const [value, names] of parameter.dependents) {
					out += `${"\t".repeat(level + 1)}(${String(value)})\n`;
					for (const name of names) {
						out += render(this.getParameter(name), level + 2);
					}
				}
			}
			return out;
		};
		return render(this._root, 0);
	}

	override clone(): HierarchicalSearchSpace {
		return new HierarchicalSearchSpace(
			Object.values(this.parameters).map((p) => p.clone()),
			this._parameterConstraints.map((c) => c.clone()),
		);
	}

	private resolveApplicable(parameters: Parameterization, checkAllParametersPresent: boolean): ApplicableResult {
		const applicable = new Set<string>();
		const stack: Parameter[] = [this._root];
		while (stack.length > 0) {
			const parameter = stack.pop();
			if (parameter === undefined) break;
			applicable.add(parameter.name);
			if (!Object.hasOwn(parameters, parameter.name)) {
				if (checkAllParametersPresent) {
					return { ok: false, missing: parameter.name };
				}
				continue;
			}
			if (!parameter.isHierarchical) continue;
			const value = parameters[parameter.name];
			for (const [branch, names] of parameter.dependents) {
				if (branch !== value) continue;
				for (const name of names) {
					stack.push(this.getParameter(name));
				}
			}
		}
		return { ok: true, names: applicable };
	}

	private violation(parameterization: Parameterization, detail: string): HierarchyViolationError {
		const structure = this.hierarchicalStructureStr();
		return new HierarchyViolationError(
			`Parameterization ${JSON.stringify(parameterization)} violates the hierarchical structure of the search space:\n${structure}${detail}`,
			structure,
		);
	}

	private findRoot(): Parameter {
		const dependentNames = new Set<string>();
		for (const parameter of Object.values(this.parameters)) {
			if (!parameter.isHierarchical) continue;
			for (const names of parameter.dependents.values()) {
				for (const name of names) {
					if (!this.hasParameter(name)) {
						throw new HierarchyStructureError(
							`Parameter \`${parameter.name}\` lists dependent \`${name}\`, which is not part of the search space.`,
							[name],
						);
					}
					dependentNames.add(name);
				}
			}
		}

		const candidates = Object.keys(this.parameters).filter((name) => !dependentNames.has(name));
		const [root] = candidates;
		if (candidates.length !== 1 || root === undefined) {
			throw new HierarchyStructureError(
				`Could not find the root parameter; found dependent parameters [${[...dependentNames].join(", ")}], with ${this._parameters.size} total parameters. Root parameter candidates: [${candidates.join(", ")}]. Having multiple independent parameters is not yet supported.`,
				candidates,
			);
		}
		return this.getParameter(root);
	}

	/**
	 * Every subtree must be disjoint from its siblings, and every parameter
	 * must be reached from the root.
	 */
	private validateHierarchicalStructure(): void {
		const checkSubtree = (parameter: Parameter, ancestors: ReadonlySet<string>): Set<string> => {
			logger.debug({ parameter: parameter.name }, "Verifying subtree");
			const visited = new Set([parameter.name]);
			if (!parameter.isHierarchical) return visited;

			const path = new Set(ancestors).add(parameter.name);
			for (const names of parameter.dependents.values()) {
				for (const name of names) {
					if (path.has(name)) {
						throw new HierarchyStructureError(
							`Parameter \`${name}\` depends on itself through \`${parameter.name}\`; the hierarchy must be a tree.`,
							[name],
						);
					}
					disjointUnionInto(visited, checkSubtree(this.getParameter(name), path));
				}
			}
			logger.debug({ parameter: parameter.name, visited: [...visited] }, "Visited parameters in subtree");
			return visited;
		};

		const visited = checkSubtree(this._root, new Set());
		const unreached = Object.keys(this.parameters).filter((name) => !visited.has(name));
		if (unreached.length > 0) {
			throw new HierarchyStructureError(
				`Parameters [${unreached.join(", ")}] are not reachable from the root. Please check that the hierarchical search space provided is represented as a valid tree with a single root.`,
				unreached,
			);
		}
		logger.debug({ visited: [...visited] }, "Visited all parameters in the tree");
	}

	private dummyValues(names: readonly string[], random: boolean, source: RandomSource): Parameterization {
		const values: Parameterization = {};
		for (const name of names) {
			values[name] = dummyValue(this.getParameter(name), random, source);
		}
		return values;
	}
}

/**
 * A stand-in value for a parameter that has none: the fixed value, the
 * middle (or a random) choice, or the scale-aware midpoint (or a uniform
 * draw) of a range.
 */
export function dummyValue(parameter: Parameter, random: boolean, source: RandomSource = Math.random): ParameterValue {
	switch (parameter.kind) {
		case "fixed":
			return parameter.value;
		case "choice": {
			const { values } = parameter;
			const index = random ? Math.floor(source() * values.length) : Math.floor(values.length / 2);
			return values[Math.min(index, values.length - 1)] ?? null;
		}
		case "range": {
			const { lower, upper } = parameter;
			let value: number;
			if (random) {
				value = lower + (upper - lower) * source();
			} else if (parameter.logScale) {
				value = 10 ** ((Math.log10(lower) + Math.log10(upper)) / 2);
			} else if (parameter.logitScale) {
				value = expit((logit(lower) + logit(upper)) / 2);
			} else {
				value = (lower + upper) / 2;
			}
			if (parameter.parameterType === "int") {
				// Shift so truncation lands uniformly around the midpoint.
				value += 0.5;
			}
			return parameter.cast(value);
		}
	}
}

function logit(p: number): number {
	return Math.log(p / (1 - p));
}

function expit(x: number): number {
	return 1 / (1 + Math.exp(-x));
}

function sameDependents(a: Parameter, b: Parameter): boolean {
	if (!a.isHierarchical || !b.isHierarchical) return a.isHierarchical === b.isHierarchical;
	const left = a.dependents;
	const right = b.dependents;
	if (left.size !== right.size) return false;
	for (const [value, names] of left) {
		const other = right.get(value);
		if (other === undefined || other.length !== names.length || names.some((name, i) => other[i] !== name)) {
			return false;
		}
	}
	return true;
}

function disjointUnionInto(target: Set<string>, other: ReadonlySet<string>): void {
	const shared = [...other].filter((name) => target.has(name));
	if (shared.length > 0) {
		throw new HierarchyStructureError(
			`Two subtrees in the search space contain the same parameters: [${shared.join(", ")}].`,
			shared,
		);
	}
	for (const name of other) target.add(name);
}
