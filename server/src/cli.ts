import fs from 'fs';
import path from 'path';
import { parseArgs } from 'util';
import type { Logger } from 'pino';
import defaultLogger, { createLogger } from './utils/logger';
import { AppError, ConfigurationError, errorMessage } from './utils/errors';
import { loadConfig, MonitorConfig } from './config';
import { MonitorHandle, startMonitor } from './monitor';
import {
  isServiceCommand,
  ServiceCommand,
  SERVICE_COMMANDS,
  ServiceDefinition,
  SystemdServiceManager,
} from './services/host/SystemdServiceManager';

const SERVICE_NAME = 'endpoint-watch';
const FORCE_EXIT_MS = 10_000;

export const USAGE = `
Usage: endpoint-watch [--config <path>] [--service <command>]

Options:
  -c, --config <path>     YAML config file (default: ./config.yaml, then environment)
  -s, --service <command> Control the host service: ${SERVICE_COMMANDS.join(' | ')}
  -h, --help              Show this help
`;

export interface CliOptions {
  configPath?: string;
  service: ServiceCommand | null;
  help: boolean;
}

export class CliUsageError extends AppError {}

export function parseCliArgs(argv: string[]): CliOptions {
  let values: { config?: string; service?: string; help?: boolean };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        config: { type: 'string', short: 'c' },
        service: { type: 'string', short: 's' },
        help: { type: 'boolean', short: 'h', default: false },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (error) {
    throw new CliUsageError(errorMessage(error));
  }

  const service = values.service ?? null;
  if (service !== null && !isServiceCommand(service)) {
    throw new CliUsageError(`unknown service command: ${service}`);
  }

  return {
    configPath: values.config,
    service,
    help: values.help ?? false,
  };
}

export interface CliDeps {
  loadConfig: (configPath?: string) => MonitorConfig;
  createRunLogger: (config: MonitorConfig) => Logger;
  startMonitor: (config: MonitorConfig, logger: Logger) => Promise<MonitorHandle>;
  createServiceManager: (definition: ServiceDefinition) => Pick<
    SystemdServiceManager,
    'install' | 'uninstall' | 'start' | 'stop' | 'status'
  >;
  waitForSignal: () => Promise<string>;
  write: (text: string) => void;
  logger: Logger;
  cwd: string;
  execPath: string;
  scriptPath: string;
}

function waitForTerminationSignal(): Promise<string> {
  return new Promise(resolve => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.removeListener('SIGINT', onSignal);
      process.removeListener('SIGTERM', onSignal);
      resolve(signal);
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  });
}

export function defaultCliDeps(): CliDeps {
  return {
    loadConfig: (configPath) => loadConfig({ configPath }),
    createRunLogger: (config) => createLogger({
      level: config.log.level,
      destination: config.log.file ?? undefined,
    }),
    startMonitor,
    createServiceManager: (definition) => new SystemdServiceManager(definition),
    waitForSignal: waitForTerminationSignal,
    write: (text) => process.stdout.write(text),
    logger: defaultLogger,
    cwd: process.cwd(),
    execPath: process.execPath,
    scriptPath: path.resolve(process.argv[1] ?? 'dist/index.js'),
  };
}

/**
 * Run the CLI and resolve with the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = defaultCliDeps()): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    deps.write(`${errorMessage(error)}\n${USAGE}`);
    return 1;
  }

  if (options.help) {
    deps.write(USAGE);
    return 0;
  }

  if (options.service === null || options.service === 'run') {
    return runForeground(options, deps);
  }

  return controlService(options.service, options, deps);
}

async function runForeground(options: CliOptions, deps: CliDeps): Promise<number> {
  let config: MonitorConfig;
  try {
    config = deps.loadConfig(options.configPath);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      deps.logger.fatal({ field: error.field }, error.message);
      return 1;
    }
    throw error;
  }

  const logger = deps.createRunLogger(config);
  logger.info({ source: config.source, configPath: config.configPath, targets: config.urls.length }, 'configuration loaded');

  const handle = await deps.startMonitor(config, logger);

  const signal = await deps.waitForSignal();
  logger.info({ signal }, 'received signal, shutting down');

  const forceExitTimer = setTimeout(() => {
    logger.warn('forcing exit after timeout');
    process.exit(1);
  }, FORCE_EXIT_MS);
  forceExitTimer.unref();

  try {
    await handle.shutdown();
  } finally {
    clearTimeout(forceExitTimer);
  }
  return 0;
}

function resolveServiceConfigPath(options: CliOptions, cwd: string): string | null {
  if (options.configPath) return path.resolve(cwd, options.configPath);
  const fallback = path.resolve(cwd, 'config.yaml');
  return fs.existsSync(fallback) ? fallback : null;
}

async function controlService(
  command: Exclude<ServiceCommand, 'run'>,
  options: CliOptions,
  deps: CliDeps
): Promise<number> {
  const { logger } = deps;

  try {
    const configPath = resolveServiceConfigPath(options, deps.cwd);
    const manager = deps.createServiceManager({
      name: SERVICE_NAME,
      description: 'HTTP endpoint monitor',
      execPath: deps.execPath,
      scriptPath: deps.scriptPath,
      configPath,
      workingDirectory: deps.cwd,
    });

    switch (command) {
      case 'install':
        // Validate the config before writing the unit.
        deps.loadConfig(configPath ?? undefined);
        await manager.install();
        break;
      case 'uninstall':
        await manager.uninstall();
        break;
      case 'start':
        await manager.start();
        break;
      case 'stop':
        await manager.stop();
        break;
      case 'status':
        deps.write(`${await manager.status()}\n`);
        return 0;
    }

    logger.info({ command }, 'service command succeeded');
    return 0;
  } catch (error) {
    if (error instanceof AppError) {
      logger.error({ command }, error.message);
      return 1;
    }
    throw error;
  }
}
