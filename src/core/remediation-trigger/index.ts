export { checkRemediation } from './remediation-trigger';
export { targetKey, createRemediationLedger } from './helpers';
export type { RemediationSite, RemediationLedger, RemediationContext, RemediationCheckResult } from './types';
