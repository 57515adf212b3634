import { hashObject } from "@paramspace/common";
import type { Parameterization } from "./types";

/**
 * A named candidate point. Arms are values: operations that change the
 * parameterization return a new arm.
 */
export class Arm {
	readonly parameters: Readonly<Parameterization>;
	private readonly _name: string | undefined;

	constructor(parameters: Parameterization, name?: string) {
		this.parameters = Object.freeze({ ...parameters });
		this._name = name;
	}

	get hasName(): boolean {
		return this._name !== undefined;
	}

	get name(): string | undefined {
		return this._name;
	}

	/** Stable hash of the parameterization; independent of key order and name. */
	get signature(): string {
		return hashObject(this.parameters);
	}

	clone(): Arm {
		return new Arm({ ...this.parameters }, this._name);
	}

	equals(other: Arm): boolean {
		return this._name === other._name && this.signature === other.signature;
	}

	toString(): string {
		const label = this._name === undefined ? "" : `name='${this._name}', `;
		return `Arm(${label}parameters=${JSON.stringify(this.parameters)})`;
	}
}
