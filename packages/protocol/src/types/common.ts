// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * UUID string identifier
 */
export type Id = string;

/**
 * Opaque JSON-like object. The bridge never inspects command payloads
 * beyond the few fields it documents.
 */
export type JsonObject = Record<string, unknown>;
