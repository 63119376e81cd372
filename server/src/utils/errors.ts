import { Request, Response, NextFunction } from 'express';
import logger from './logger';

/**
 * Base application error class
 */
export class AppError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid or missing configuration. Fatal at startup.
 */
export class ConfigurationError extends AppError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.field = field;
  }
}

/**
 * A host service manager command (systemctl) failed.
 */
export class ServiceControlError extends AppError {
  public readonly command: string;

  constructor(command: string, message: string) {
    super(`service ${command} failed: ${message}`);
    this.command = command;
  }
}

export interface ErrorResponse {
  error: string;
}

/**
 * Express error handling middleware for the metrics server.
 * Never exposes raw error messages to scrapers.
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  logger.error({ err: error, method: req.method, path: req.path }, 'request failed');
  const response: ErrorResponse = { error: 'Internal server error' };
  res.status(500).json(response);
}

/**
 * Async route handler wrapper that catches errors and forwards to error middleware
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Known socket error codes mapped to short descriptions.
 */
const NETWORK_ERROR_DESCRIPTIONS: Array<{ pattern: RegExp; description: string }> = [
  { pattern: /ECONNREFUSED/i, description: 'Connection refused' },
  { pattern: /ECONNRESET/i, description: 'Connection reset' },
  { pattern: /ETIMEDOUT/i, description: 'Connection timed out' },
  { pattern: /ENOTFOUND/i, description: 'DNS lookup failed' },
  { pattern: /EAI_AGAIN/i, description: 'DNS lookup failed' },
  { pattern: /EHOSTUNREACH/i, description: 'Host unreachable' },
  { pattern: /ENETUNREACH/i, description: 'Network unreachable' },
  { pattern: /ECONNABORTED/i, description: 'Connection aborted' },
  { pattern: /EPIPE/i, description: 'Connection broken' },
  { pattern: /UND_ERR_SOCKET/i, description: 'Connection closed by server' },
  { pattern: /CERT|certificate/i, description: 'TLS certificate error' },
  { pattern: /self[- ]signed/i, description: 'TLS certificate error' },
];

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Describe a transport-level request failure in one line.
 *
 * fetch() rejects with a generic "fetch failed" TypeError and puts the
 * socket error in `cause`, so the cause is inspected first.
 */
export function describeRequestError(error: unknown): string {
  const cause = error instanceof Error && error.cause !== undefined ? error.cause : undefined;

  for (const candidate of [cause, error]) {
    if (candidate === undefined) continue;
    const text = `${errorCode(candidate) ?? ''} ${errorMessage(candidate)}`;
    for (const { pattern, description } of NETWORK_ERROR_DESCRIPTIONS) {
      if (pattern.test(text)) return description;
    }
  }

  if (cause !== undefined) return errorMessage(cause);
  return errorMessage(error);
}
