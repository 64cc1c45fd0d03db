export { parseClientEvent } from './event-validator';
export { withTimeout } from './timeout';
