export { requestWithTimeout, requestJson, requestText, readJsonObject, isRecord, findCookie } from './http';
