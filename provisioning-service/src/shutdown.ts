import { SERVICE } from './config.js';

/** First signal aborts the run between requests; a second one exits immediately. */
export function registerShutdown(controller: AbortController) {
  const shutdown = () => {
    if (controller.signal.aborted) {
      console.warn(`[${SERVICE}] forced exit`);
      process.exit(130);
    }
    console.log(`[${SERVICE}] shutting down after the current request...`);
    controller.abort();
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
