export { createMonitorState } from './state';
export type { MonitorState, SiteState } from './types';
