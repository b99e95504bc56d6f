export { parsePayload, type PayloadSchema } from './payload-schema.js';
