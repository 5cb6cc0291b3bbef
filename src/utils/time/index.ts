export { now, secondsToMs, sleep, nodeTimer } from './time';
