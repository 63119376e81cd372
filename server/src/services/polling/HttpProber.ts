import type { Logger } from 'pino';
import defaultLogger from '../../utils/logger';
import { describeRequestError } from '../../utils/errors';
import { classifyProbe, formatDuration } from './classify';
import { AlertPolicy, IProber, PollOutcome, ProbeResult } from './types';

const USER_AGENT = 'endpoint-watch/1.0';

export interface HttpProberOptions {
  policy: AlertPolicy;
  logger?: Logger;
  now?: () => number;
}

/**
 * Issues a single GET per probe and classifies the result.
 * Never rejects: transport failures become `error` outcomes.
 */
export class HttpProber implements IProber {
  private policy: AlertPolicy;
  private logger: Logger;
  private now: () => number;

  constructor(options: HttpProberOptions) {
    this.policy = options.policy;
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => Date.now());
  }

  async probe(url: string, timeoutMs: number, signal?: AbortSignal): Promise<PollOutcome> {
    const startTime = this.now();
    const result = await this.request(url, timeoutMs, startTime, signal);
    const { status, detail } = classifyProbe(result, this.policy);

    return {
      url,
      status,
      detail,
      latencyMs: result.latencyMs,
      timestamp: startTime,
      ...(result.statusCode !== undefined && { statusCode: result.statusCode }),
    };
  }

  private async request(
    url: string,
    timeoutMs: number,
    startTime: number,
    signal?: AbortSignal
  ): Promise<ProbeResult> {
    const controller = new AbortController();
    let timedOut = false;

    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCancel = () => controller.abort();
    signal?.addEventListener('abort', onCancel, { once: true });

    try {
      if (signal?.aborted) {
        return { error: 'request cancelled', latencyMs: 0 };
      }

      const response = await fetch(url, {
        method: 'GET',
        headers: { 'User-Agent': USER_AGENT },
        redirect: 'follow',
        signal: controller.signal,
      });
      const latencyMs = this.now() - startTime;

      // Only headers matter; release the connection without reading the body.
      if (response.body) {
        await response.body.cancel().catch((err: unknown) => {
          this.logger.debug({ err, url }, 'failed to discard response body');
        });
      }

      return { statusCode: response.status, latencyMs };
    } catch (err: unknown) {
      const latencyMs = this.now() - startTime;
      if (timedOut) {
        return { error: `request timed out after ${formatDuration(timeoutMs)}`, latencyMs };
      }
      if (signal?.aborted) {
        return { error: 'request cancelled', latencyMs };
      }
      return { error: describeRequestError(err), latencyMs };
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onCancel);
    }
  }
}
