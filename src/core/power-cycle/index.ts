export { runPowerCycle } from './power-cycle';
export { validatePowerCycleOptions } from './helpers';
export type {
  PowerCycleState,
  PowerCycleOutcome,
  PowerCycleFailureReason,
  PowerCycleOptions,
  PowerCycleResult
} from './types';
