export { createUpsClient, parseSwitchedOn, UPS_API_PATH, UPS_POWER_DISTRIBUTION } from './ups';
export type { UpsClient, UpsClientConfig, UpsClientDependencies } from './types';
