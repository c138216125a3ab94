export { createRedisClient, toScriptClient, redactRedisUrl, reconnectDelay } from './redis';
export type { RedisScriptClient } from './redis';
