export { KeyedMutex } from './keyed-mutex.js';
export { WorkerPool } from './worker-pool.js';
export { withTimeout } from './timeout.js';
