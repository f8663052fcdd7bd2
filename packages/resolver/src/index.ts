export type { DeclarationId, FrameId, TypeId, TypeParamId } from "./ids.js";
export * from "./diagnostics/index.js";
export * from "./types/type-arena.js";
export * from "./types/predicate.js";
export * from "./types/type-hierarchy.js";
export * from "./receivers/receiver-stack.js";
export * from "./declarations/types.js";
export * from "./declarations/declaration-table.js";
export * from "./resolution/types.js";
export { matchReceiver, type ResolutionInput } from "./resolution/match.js";
export { resolveOrdered } from "./resolution/ordered.js";
export { resolveUnordered } from "./resolution/unordered.js";
export {
  crossCheckOrdered,
  enumerateOrderedAssignments,
  framePositions,
  lastOrderedAssignment,
} from "./resolution/cross-check.js";
export { isMoreSpecific, mostSpecificBindings } from "./resolution/specificity.js";
export {
  constructCall,
  describeArgument,
  formatSyntheticCall,
  resolveThis,
} from "./resolution/call-construction.js";
export * from "./resolution/resolver.js";
export * from "./config.js";
export * from "./trace.js";
