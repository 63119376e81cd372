import fs from 'fs';
import path from 'path';
import { execFile } from 'child_process';
import { promisify } from 'util';
import type { Logger } from 'pino';
import defaultLogger from '../../utils/logger';
import { ServiceControlError, errorMessage } from '../../utils/errors';

export type ServiceCommand = 'install' | 'uninstall' | 'start' | 'stop' | 'status' | 'run';

export const SERVICE_COMMANDS: readonly ServiceCommand[] = [
  'install', 'uninstall', 'start', 'stop', 'status', 'run',
];

export function isServiceCommand(value: string): value is ServiceCommand {
  return SERVICE_COMMANDS.some(command => command === value);
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (file: string, args: string[]) => Promise<CommandOutput>;

const execFileAsync = promisify(execFile);

const defaultRunner: CommandRunner = async (file, args) => {
  const { stdout, stderr } = await execFileAsync(file, args, { encoding: 'utf8' });
  return { stdout, stderr };
};

export interface ServiceDefinition {
  name: string;
  description: string;
  /** Absolute path of the node binary. */
  execPath: string;
  /** Absolute path of the entry script. */
  scriptPath: string;
  /** Absolute path passed as --config, if any. */
  configPath?: string | null;
  workingDirectory: string;
}

export interface SystemdServiceManagerOptions {
  unitDir?: string;
  runner?: CommandRunner;
  logger?: Logger;
}

/**
 * Installs and controls the monitor as a systemd unit.
 */
export class SystemdServiceManager {
  private definition: ServiceDefinition;
  private unitDir: string;
  private runner: CommandRunner;
  private logger: Logger;

  constructor(definition: ServiceDefinition, options: SystemdServiceManagerOptions = {}) {
    this.definition = definition;
    this.unitDir = options.unitDir ?? '/etc/systemd/system';
    this.runner = options.runner ?? defaultRunner;
    this.logger = options.logger ?? defaultLogger;
  }

  get unitName(): string {
    return `${this.definition.name}.service`;
  }

  get unitPath(): string {
    return path.join(this.unitDir, this.unitName);
  }

  renderUnit(): string {
    const { description, execPath, scriptPath, configPath, workingDirectory } = this.definition;
    const execStart = [execPath, scriptPath, ...(configPath ? ['--config', configPath] : [])]
      .map(quoteArg)
      .join(' ');

    return [
      '[Unit]',
      `Description=${description}`,
      'After=network-online.target',
      'Wants=network-online.target',
      '',
      '[Service]',
      'Type=simple',
      `ExecStart=${execStart}`,
      `WorkingDirectory=${workingDirectory}`,
      'Environment=NODE_ENV=production',
      'Restart=on-failure',
      'RestartSec=5',
      'KillSignal=SIGTERM',
      'TimeoutStopSec=15',
      '',
      '[Install]',
      'WantedBy=multi-user.target',
      '',
    ].join('\n');
  }

  async install(): Promise<void> {
    try {
      fs.mkdirSync(this.unitDir, { recursive: true });
      fs.writeFileSync(this.unitPath, this.renderUnit(), { mode: 0o644 });
    } catch (error) {
      throw new ServiceControlError('install', `cannot write ${this.unitPath}: ${errorMessage(error)}`);
    }
    this.logger.info({ unit: this.unitPath }, 'unit file written');

    await this.systemctl('install', 'daemon-reload');
    await this.systemctl('install', 'enable', this.unitName);
  }

  async uninstall(): Promise<void> {
    try {
      await this.systemctl('uninstall', 'stop', this.unitName);
    } catch (error) {
      this.logger.warn({ err: error }, 'stop before uninstall failed; continuing');
    }
    await this.systemctl('uninstall', 'disable', this.unitName);

    try {
      fs.rmSync(this.unitPath, { force: true });
    } catch (error) {
      throw new ServiceControlError('uninstall', `cannot remove ${this.unitPath}: ${errorMessage(error)}`);
    }
    await this.systemctl('uninstall', 'daemon-reload');
  }

  async start(): Promise<void> {
    await this.systemctl('start', 'start', this.unitName);
  }

  async stop(): Promise<void> {
    await this.systemctl('stop', 'stop', this.unitName);
  }

  /**
   * `systemctl is-active` exits non-zero for inactive units; its stdout
   * still carries the state, so that is what gets reported.
   */
  async status(): Promise<string> {
    try {
      const { stdout } = await this.runner('systemctl', ['is-active', this.unitName]);
      return stdout.trim();
    } catch (error) {
      const stdout = outputOf(error);
      if (stdout) return stdout;
      throw new ServiceControlError('status', errorMessage(error));
    }
  }

  private async systemctl(command: ServiceCommand, ...args: string[]): Promise<CommandOutput> {
    try {
      return await this.runner('systemctl', args);
    } catch (error) {
      throw new ServiceControlError(command, `systemctl ${args.join(' ')}: ${errorMessage(error)}`);
    }
  }
}

function quoteArg(arg: string): string {
  return /[\s"\\]/.test(arg) ? `"${arg.replace(/(["\\])/g, '\\$1')}"` : arg;
}

function outputOf(error: unknown): string {
  if (typeof error !== 'object' || error === null || !('stdout' in error)) return '';
  return typeof error.stdout === 'string' ? error.stdout.trim() : '';
}
