// Fastify type augmentation for the storage gateway

import type { Config } from '../config/index.js';
import type { Storage } from '../storage/types.js';

// Augment Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    storage: Storage;
  }
}
