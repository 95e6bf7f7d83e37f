/**
 * Branded Types for Connect identifiers
 *
 * Uses TypeScript's structural typing escape hatch to create nominal types
 * that prevent accidental mixing of different ID types at compile time.
 * Each branded type is still a string at runtime but distinct in the type system.
 */

// =============================================================================
// § Brand Symbols (unique per type)
// =============================================================================

declare const SourceIdBrand: unique symbol;
declare const EndpointIdBrand: unique symbol;

// =============================================================================
// § Branded Types
// =============================================================================

/** Identifier the service returns for one submission of a dataset (source_name + version) */
export type SourceId = string & { readonly __brand: typeof SourceIdBrand };

/** UUID of a file-staging endpoint */
export type EndpointId = string & { readonly __brand: typeof EndpointIdBrand };

// =============================================================================
// § Constructor Functions
// =============================================================================

export function SourceId(value: string): SourceId {
  return value as SourceId;
}

export function EndpointId(value: string): EndpointId {
  return value as EndpointId;
}
