/**
 * Entry point of a forked worker process.
 */

import { errorMessage, logFatal } from '../logging/index.js';
import { processParentPort, runWorkerProcess } from './worker-process.js';

runWorkerProcess(processParentPort()).then(
  (code) => {
    process.exitCode = code;
    // Let the exit report flush before the channel closes
    if (process.connected) {
      process.disconnect();
    }
    setTimeout(() => process.exit(code), 1_000).unref();
  },
  (error: unknown) => {
    logFatal(`Worker process failed: ${errorMessage(error)}`, {
      component: 'worker-process',
      error_message: errorMessage(error),
    });
    process.exit(1);
  }
);
