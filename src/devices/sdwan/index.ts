export { createSdwanClient } from './sdwan';
export { collectSiteDevices, parseDevice, parsePathRecords, extractData, CONTROLLER_PERSONALITIES, REACHABLE } from './helpers';
export type { SdwanClient, SdwanClientConfig, SdwanClientDependencies, SdwanDevice } from './types';
