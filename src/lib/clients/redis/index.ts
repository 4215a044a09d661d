export { RedisClient } from './RedisClient';
export type { RedisConfig } from './RedisClient';
