export { classifyProbe } from './probe-classifier';
export { recordsForColor, normalizeState } from './helpers';
