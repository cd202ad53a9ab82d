import { describe, it, expect } from 'vitest';
import { InvalidConfigError } from '@lineup-sim/model';
import { DEFAULT_SIMULATION_CONFIG, createSimulationConfig } from './config.js';

describe('createSimulationConfig', () => {
	it('should default every option', () => {
		expect(createSimulationConfig()).toEqual({
			dpAttemptProbabilityOnGroundOut: 0.4,
			doublePlayRunnerOutWeights: { first: 1, second: 1, third: 1 },
			fieldersChoiceOutWeights: { batter: 1, first: 1, second: 1, third: 1 },
			inningsPerGame: 9,
			numGames: 162,
		});
	});

	it('should merge partial weight maps over the defaults', () => {
		const config = createSimulationConfig({
			doublePlayRunnerOutWeights: { first: 3 },
			fieldersChoiceOutWeights: { batter: 0 },
		});

		expect(config.doublePlayRunnerOutWeights).toEqual({ first: 3, second: 1, third: 1 });
		expect(config.fieldersChoiceOutWeights).toEqual({ batter: 0, first: 1, second: 1, third: 1 });
	});

	it('should freeze the config and its weight maps', () => {
		const config = createSimulationConfig({ numGames: 10 });

		expect(Object.isFrozen(config)).toBe(true);
		expect(Object.isFrozen(config.doublePlayRunnerOutWeights)).toBe(true);
		expect(Object.isFrozen(DEFAULT_SIMULATION_CONFIG)).toBe(true);
	});

	it.each([
		[{ dpAttemptProbabilityOnGroundOut: 1.2 }, /dpAttemptProbabilityOnGroundOut/],
		[{ dpAttemptProbabilityOnGroundOut: Number.NaN }, /dpAttemptProbabilityOnGroundOut/],
		[{ doublePlayRunnerOutWeights: { second: -1 } }, /doublePlayRunnerOutWeights\.second/],
		[{ fieldersChoiceOutWeights: { batter: Number.POSITIVE_INFINITY } }, /fieldersChoiceOutWeights\.batter/],
		[{ inningsPerGame: 0 }, /inningsPerGame/],
		[{ numGames: 2.5 }, /numGames/],
	])('should reject %o', (input, message) => {
		expect(() => createSimulationConfig(input)).toThrow(InvalidConfigError);
		expect(() => createSimulationConfig(input)).toThrow(message);
	});
});
