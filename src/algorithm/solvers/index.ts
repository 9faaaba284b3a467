/**
 * Constraint solver suite
 */

export { iterativeProjectionLayout, goldenWidths } from './projection';
export { interiorPointLayout, barrierMargin } from './interior-point';
export { activeSetLayout, isActiveColumn } from './active-set';
export { relaxationLayout } from './relaxation';
export { pivotExpansionLayout, pivotWidths } from './pivot';
