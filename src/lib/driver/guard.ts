import { withTimeout } from '../common/utils/retry.ts';
import { asDriverError } from '../errors.ts';

/**
 * Bounds a driver call by `timeoutMs` and maps untyped failures to `driver_error`.
 */
export async function callDriver<T>(
  operation: string,
  timeoutMs: number,
  call: () => Promise<T>,
): Promise<T> {
  try {
    return await withTimeout(call(), timeoutMs, `Driver ${operation}`);
  } catch (err) {
    throw asDriverError(err, operation);
  }
}
