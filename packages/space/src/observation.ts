import type { Parameterization } from "./types";

export interface ObservationFeaturesInit {
	parameters: Parameterization;
	trialIndex?: number;
	metadata?: Record<string, unknown>;
	/**
	 * Parameterization as it was before hierarchical casting dropped the
	 * inapplicable parameters.
	 */
	fullParameterization?: Parameterization;
}

/**
 * Features of one observed point, as handed to a modeling layer.
 */
export class ObservationFeatures {
	readonly parameters: Readonly<Parameterization>;
	readonly trialIndex: number | undefined;
	readonly metadata: Readonly<Record<string, unknown>> | undefined;
	readonly fullParameterization: Readonly<Parameterization> | undefined;

	constructor(init: ObservationFeaturesInit) {
		this.parameters = { ...init.parameters };
		this.trialIndex = init.trialIndex;
		this.metadata = init.metadata ? { ...init.metadata } : undefined;
		this.fullParameterization = init.fullParameterization ? { ...init.fullParameterization } : undefined;
	}

	/** Copy with selected fields replaced. */
	clone(replace: Partial<ObservationFeaturesInit> = {}): ObservationFeatures {
		return new ObservationFeatures({
			parameters: { ...(replace.parameters ?? this.parameters) },
			trialIndex: "trialIndex" in replace ? replace.trialIndex : this.trialIndex,
			metadata: "metadata" in replace ? replace.metadata : this.metadata,
			fullParameterization:
				"fullParameterization" in replace ? replace.fullParameterization : this.fullParameterization,
		});
	}
}
