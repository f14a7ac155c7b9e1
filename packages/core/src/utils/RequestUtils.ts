export { generateRequestId } from './request/generateRequestId.js';
