export type { KeyValueStore } from './types.js';
export { MemoryStore } from './memory-store.js';
export { RedisStore, createRedisClient } from './redis-store.js';
export { encodeVariable, decodeVariable } from './variable-codec.js';
