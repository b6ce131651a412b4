/**
 * Common type definitions used throughout the project
 */

/**
 * Raw probe output in millivolts
 */
export type MillivoltReading = number;

/**
 * Converted pH value
 */
export type PhValue = number;
