/**
 * Baseball game state machine
 *
 * Models all 24 base/out states (0/1/2 outs × 8 base configurations)
 * and resolves each plate appearance outcome into the next one.
 */

// Export core types
export type { BaseConfig, BaserunningState, BaserunningEvent, OutCount } from './state.js';
export type { ResolutionContext, PlayLog, RuleResult, Destination } from './movement.js';
export type { TransitionResult } from './transitions.js';

// Export utilities
export {
	BASES,
	BASES_LEAD_FIRST,
	BaseConfigNames,
	runnersToBaseConfig,
	createBaserunningState,
	createEmptyState,
	cloneState,
	snapshotBases,
	isBaseOccupied,
	isBasesEmpty,
	countRunners,
	forcedBases,
	assertValidState,
} from './state.js';

// Export main transition function
export { transition } from './transitions.js';

// Export rule handlers (for testing)
export { handleGroundOut } from './rules/ground-out.js';
export { handleWalkOrHBP } from './rules/walk.js';
export { handleHit } from './rules/hit.js';
export { handleStrikeout } from './rules/strikeout.js';
export { handleFlyOut } from './rules/fly-out.js';
