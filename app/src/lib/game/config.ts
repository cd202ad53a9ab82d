/**
 * Simulation config: defaults, merging and validation
 */

import { InvalidConfigError } from '@lineup-sim/model';
import type { Base, FieldersChoiceTarget, SimulationConfig } from './types.js';

export interface SimulationConfigInput {
	dpAttemptProbabilityOnGroundOut?: number;
	doublePlayRunnerOutWeights?: Partial<Record<Base, number>>;
	fieldersChoiceOutWeights?: Partial<Record<FieldersChoiceTarget, number>>;
	inningsPerGame?: number;
	numGames?: number;
}

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = Object.freeze({
	dpAttemptProbabilityOnGroundOut: 0.4,
	doublePlayRunnerOutWeights: Object.freeze({ first: 1, second: 1, third: 1 }),
	fieldersChoiceOutWeights: Object.freeze({ batter: 1, first: 1, second: 1, third: 1 }),
	inningsPerGame: 9,
	numGames: 162,
});

function checkWeights(name: string, weights: Readonly<Record<string, number>>): void {
	for (const [key, weight] of Object.entries(weights)) {
		if (!Number.isFinite(weight) || weight < 0) {
			throw new InvalidConfigError(`${name}.${key} must be a non-negative number, got ${weight}`);
		}
	}
}

function checkPositiveInteger(name: string, value: number): void {
	if (!Number.isInteger(value) || value <= 0) {
		throw new InvalidConfigError(`${name} must be a positive integer, got ${value}`);
	}
}

/**
 * Build a frozen config. Weight maps merge over the defaults, so a key
 * left out keeps its default weight of 1.
 */
export function createSimulationConfig(input: SimulationConfigInput = {}): SimulationConfig {
	const config: SimulationConfig = {
		dpAttemptProbabilityOnGroundOut:
			input.dpAttemptProbabilityOnGroundOut ?? DEFAULT_SIMULATION_CONFIG.dpAttemptProbabilityOnGroundOut,
		doublePlayRunnerOutWeights: Object.freeze({
			...DEFAULT_SIMULATION_CONFIG.doublePlayRunnerOutWeights,
			...input.doublePlayRunnerOutWeights,
		}),
		fieldersChoiceOutWeights: Object.freeze({
			...DEFAULT_SIMULATION_CONFIG.fieldersChoiceOutWeights,
			...input.fieldersChoiceOutWeights,
		}),
		inningsPerGame: input.inningsPerGame ?? DEFAULT_SIMULATION_CONFIG.inningsPerGame,
		numGames: input.numGames ?? DEFAULT_SIMULATION_CONFIG.numGames,
	};

	const dp = config.dpAttemptProbabilityOnGroundOut;
	if (!Number.isFinite(dp) || dp < 0 || dp > 1) {
		throw new InvalidConfigError(`dpAttemptProbabilityOnGroundOut must be in [0, 1], got ${dp}`);
	}
	checkWeights('doublePlayRunnerOutWeights', config.doublePlayRunnerOutWeights);
	checkWeights('fieldersChoiceOutWeights', config.fieldersChoiceOutWeights);
	checkPositiveInteger('inningsPerGame', config.inningsPerGame);
	checkPositiveInteger('numGames', config.numGames);

	return Object.freeze(config);
}
