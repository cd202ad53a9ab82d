/**
 * Strikeout: batter out, runners hold
 */

import type { LineupSlot } from '../../types.js';
import type { BaserunningState } from '../state.js';
import { cloneState, toOutCount } from '../state.js';
import type { PlayLog, RuleResult } from '../movement.js';
import { putOut } from '../movement.js';

export function handleStrikeout(currentState: BaserunningState, batterSlot: LineupSlot, log: PlayLog): RuleResult {
	const nextState = cloneState(currentState);
	putOut(nextState, log, batterSlot, 'batter');
	nextState.outs = toOutCount(currentState.outs + 1);
	return { nextState, play: 'strikeout' };
}
