/**
 * Identifier aliases shared by the type arena, the receiver stack, the
 * declaration table and the resolvers. They are opaque on purpose so callers
 * cannot depend on their underlying representation.
 */
export type TypeId = number;
export type TypeParamId = number;
export type DeclarationId = number;
export type FrameId = number;
