import { settleWithin } from '@/shared/concurrency/settleWithin';
import { createLogger, errorMessage, type Logger } from '@/shared/logging/logger';

export type StopResult =
  | { kind: 'stopped' }
  | { kind: 'timeout' }
  | { kind: 'error'; error: unknown };

/**
 * Runs a stop routine with an upper bound. On timeout the routine keeps
 * running; a failure it reports later is still logged.
 */
export async function stopWithTimeout(
  name: string,
  stopFn: () => Promise<void>,
  timeoutMs: number,
  log: Logger = createLogger('Runtime'),
): Promise<StopResult> {
  const stopping = (async () => stopFn())();
  const outcome = await settleWithin(stopping, timeoutMs);

  if (outcome.kind === 'value') {
    log.info(`service ${name} stopped`);
    return { kind: 'stopped' };
  }

  if (outcome.kind === 'timeout') {
    log.warn(`service ${name} stop timed out`, { timeoutMs });
    stopping.catch((error: unknown) => {
      log.error(`failed to stop ${name}`, { message: errorMessage(error) });
    });
    return { kind: 'timeout' };
  }

  log.error(`failed to stop ${name}`, { message: errorMessage(outcome.error) });
  return { kind: 'error', error: outcome.error };
}
