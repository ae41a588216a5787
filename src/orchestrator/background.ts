import { errorMessage } from '../shared/errors.js';

/**
 * Starts work nobody waits for. Errors are logged and dropped; the returned
 * promise only exists so tests can wait for the side effect to settle.
 */
export function spawnDetached(name: string, task: () => Promise<unknown>): Promise<void> {
  return Promise.resolve()
    .then(task)
    .then(
      () => undefined,
      (err: unknown) => {
        // eslint-disable-next-line no-console
        console.error(`[background] ${name} failed: ${errorMessage(err)}`);
      },
    );
}
