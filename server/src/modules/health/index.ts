export { healthRoutes } from './health.route';
export type { HealthRoutesOptions } from './health.route';
