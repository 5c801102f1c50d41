import { errorMessage } from '../errors';
import type { MaybePromise } from './types';

/**
 * Awaits one logger call. If the logger itself throws or rejects, the failure
 * is reported on stderr and the promise still resolves.
 *
 * @param description - What was being written, for the stderr line
 */
export async function writeLog(
  description: string,
  write: () => MaybePromise<void>,
): Promise<void> {
  try {
    await write();
  } catch (error) {
    console.error(`Could not write ${description}: ${errorMessage(error)}`);
  }
}
