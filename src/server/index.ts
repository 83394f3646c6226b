/**
 * Server barrel export
 */

export { createApp, RunRequestSchema } from './server.js';
export type { RunRequest } from './server.js';
export {
  RUN_QUEUE_NAME,
  createRedisConnection,
  parseRedisUrl,
  getRunQueue,
  closeRunQueue,
  runJobId,
} from './queue.js';
