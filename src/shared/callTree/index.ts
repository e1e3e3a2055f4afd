export * from './types';
export { addCall, callCount, createForest, getNode, lastChild, wholeDuration } from './forest';
export { frameChain, resolveAttachment } from './resolve';
export { buildCallForest, TRAILING_CALL_DURATION } from './build';
