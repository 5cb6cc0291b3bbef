export {
  createLivenessWindow,
  updateLiveness,
  isConfirmedDown,
  countDown,
  resetLiveness
} from './liveness-tracker';
export { validateWindowSize } from './helpers';
export type { LivenessWindow } from './types';
