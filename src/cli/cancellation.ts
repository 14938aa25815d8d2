import { logger } from '../utils/logger.js';

const controller = new AbortController();

/** Aborted on the first SIGINT or SIGTERM */
export const cancellationSignal: AbortSignal = controller.signal;

/**
 * First signal aborts in-flight work so staging can be discarded; a second one
 * exits at once.
 */
export function installSignalHandlers(): void {
  const onSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    logger.debug(`Received ${signal}, cancelling`);
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}
