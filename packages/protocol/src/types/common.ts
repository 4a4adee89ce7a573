// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Opaque identifier (UUID for runs)
 */
export type Id = string;

/**
 * Name of a declared element (instrument, variable, alarm, plot or routine).
 * Names are unique within their section of a runcard.
 */
export type Name = string;

/**
 * Reserved axis name that plots use for the experiment clock.
 */
export const TIME_AXIS = 'Time';
