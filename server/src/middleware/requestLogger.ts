import pinoHttp from 'pino-http';
import type { Logger } from 'pino';

const REDACTED_HEADERS: ReadonlySet<string> = new Set([
  'authorization',
  'cookie',
  'set-cookie',
]);

/** Paths scraped on a schedule; logging every hit is noise. */
export const QUIET_PATHS: ReadonlySet<string> = new Set(['/metrics', '/health']);

export interface RequestLoggerOptions {
  logger: Logger;
  quietScrapes?: boolean;
}

export function createRequestLogger(options: RequestLoggerOptions) {
  const { logger, quietScrapes = true } = options;

  return pinoHttp({
    logger,

    autoLogging: {
      ignore: quietScrapes
        ? (req) => QUIET_PATHS.has(pathOf(req.url))
        : undefined,
    },

    serializers: {
      req: (req) => ({
        method: req.method,
        url: req.url,
        headers: redactHeaders(req.headers),
      }),
      res: (res) => ({
        statusCode: res.statusCode,
      }),
    },
  });
}

function pathOf(url: string | undefined): string {
  return (url ?? '/').split('?')[0];
}

function redactHeaders(
  headers: Record<string, string | string[] | undefined>
): Record<string, string | string[] | undefined> {
  const redacted: Record<string, string | string[] | undefined> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (REDACTED_HEADERS.has(key.toLowerCase())) {
      redacted[key] = '[REDACTED]';
    } else if (value !== undefined) {
      redacted[key] = value;
    }
  }
  return redacted;
}

export { redactHeaders };
