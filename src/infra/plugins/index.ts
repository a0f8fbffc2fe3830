export { registerCors, getAllowedOrigins } from './cors.js';
