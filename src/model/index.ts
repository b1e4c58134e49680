export * from './state.js';
export { Effect } from './effect.js';
export { Action, PROBABILITY_TOLERANCE } from './action.js';
export { Problem } from './problem.js';
export * from './definition.js';
