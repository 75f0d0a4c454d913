export { rateLimitPlugin } from './rate-limit';
export type { RateLimitOptions } from './rate-limit';
