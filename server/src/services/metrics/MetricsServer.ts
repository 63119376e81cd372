import http from 'http';
import type { AddressInfo } from 'net';
import type { Express } from 'express';
import type { Logger } from 'pino';
import defaultLogger from '../../utils/logger';

const DEFAULT_GRACE_MS = 5000;

export interface MetricsServerOptions {
  host: string;
  port: number;
  logger?: Logger;
}

/**
 * Owns the HTTP listener for the metrics app. Its lifecycle is independent
 * of the monitor loop.
 */
export class MetricsServer {
  private app: Express;
  private options: MetricsServerOptions;
  private logger: Logger;
  private server: http.Server | null = null;

  constructor(app: Express, options: MetricsServerOptions) {
    this.app = app;
    this.options = options;
    this.logger = options.logger ?? defaultLogger;
  }

  start(): Promise<AddressInfo> {
    if (this.server) {
      return Promise.reject(new Error('metrics server already started'));
    }

    const server = http.createServer(this.app);
    this.server = server;

    return new Promise<AddressInfo>((resolve, reject) => {
      const onError = (err: Error) => {
        this.server = null;
        reject(err);
      };
      server.once('error', onError);
      server.listen(this.options.port, this.options.host, () => {
        server.removeListener('error', onError);
        server.on('error', (err) => this.logger.error({ err }, 'metrics server error'));

        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('metrics server is not listening on a TCP port'));
          return;
        }
        this.logger.info({ host: address.address, port: address.port }, 'metrics server started');
        resolve(address);
      });
    });
  }

  /**
   * Stop accepting connections and let in-flight requests finish.
   * Connections still open after the grace period are closed.
   */
  stop(graceMs = DEFAULT_GRACE_MS): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();
    this.server = null;

    return new Promise<void>((resolve) => {
      const forceTimer = setTimeout(() => {
        this.logger.warn({ graceMs }, 'closing lingering metrics connections');
        server.closeAllConnections();
      }, graceMs);
      forceTimer.unref();

      server.close((err) => {
        clearTimeout(forceTimer);
        if (err) {
          this.logger.warn({ err }, 'metrics server close reported an error');
        }
        this.logger.info('metrics server stopped');
        resolve();
      });
      server.closeIdleConnections();
    });
  }

  get listening(): boolean {
    return this.server?.listening ?? false;
  }
}
