// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Opaque string identifier (UUIDs for generated ids)
 */
export type Id = string;

/**
 * Free-form JSON-like parameter map passed to agents
 */
export type Params = Record<string, unknown>;
