export { createSlackSink } from './slack-sink';
