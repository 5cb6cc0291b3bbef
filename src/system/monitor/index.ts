export { runCycle, runMonitor } from './monitor';
export { checkSite, formatSiteStatus } from './helpers';
export type { SiteCheckResult } from './helpers';
export type { Monitor, PathStatusSource, RunMonitorOptions, CycleSummary } from './types';
