export { BranchPromoter } from './promoter.js';
export type { BranchPromoterOptions } from './promoter.js';
export { WorkflowContext, describeStartingPoint } from './context.js';
export type { StartingPoint, PromoteOptions, PromoteResult } from './types.js';
