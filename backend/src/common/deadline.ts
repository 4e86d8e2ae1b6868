import { HttpStatus } from '@nestjs/common';
import { UpstreamUnavailableException } from './errors';

/**
 * Race `work` against a timer. The timer is cleared as soon as
 * either side settles so it never keeps the process alive.
 */
export async function withDeadline<T>(
  work: Promise<T>,
  ms: number,
  what: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () =>
        reject(
          new UpstreamUnavailableException(
            `${what} did not complete within ${ms} ms`,
            HttpStatus.GATEWAY_TIMEOUT,
          ),
        ),
      ms,
    );
  });

  try {
    return await Promise.race([work, expired]);
  } finally {
    clearTimeout(timer);
  }
}
