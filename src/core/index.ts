/**
 * Core health evaluation and remediation
 *
 * - probe-classifier: path records for one device/color to a probe outcome
 * - liveness-tracker: per-site sliding window of outcomes
 * - power-cycle: bounded-retry outlet off/on state machine
 * - remediation-trigger: fires one power cycle per confirmed outage
 */

export * from './probe-classifier';
export * from './liveness-tracker';
export * from './power-cycle';
export * from './remediation-trigger';
