export { healthRoutes } from './health.js';
export { shareRoutes } from './shares.js';
