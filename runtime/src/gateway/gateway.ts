/**
 * AwsCliGateway: composes the security policy, validator and execution
 * engine behind the help and run operations.
 *
 * @module
 */

import type { CliGateway, GatewayConfig } from './types.js';
import type {
  CommandHelpResult,
  CommandResult,
  CommandRunner,
  ExecuteOptions,
} from '../execution/types.js';
import { CommandExecutor } from '../execution/executor.js';
import { RateLimiter } from '../execution/rate-limiter.js';
import { SecurityPolicy } from '../security/policy.js';
import { SecurityPolicyWatcher } from '../security/watcher.js';
import { CommandValidator, toValidationError } from '../security/validator.js';
import { isPipeCommand } from '../shell/tokenizer.js';
import { CommandExecutionError, CommandValidationError } from '../types/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { toErrorMessage } from '../utils/async.js';

export interface AwsCliGatewayOptions {
  readonly policy: SecurityPolicy;
  readonly runner: CommandRunner;
  readonly logger?: Logger;
}

export interface CreateGatewayOptions {
  readonly logger?: Logger;
  /** Reload the policy when its file changes. Default: true when a path is set */
  readonly watchPolicy?: boolean;
}

export function buildHelpCommand(service: string, command?: string): string {
  return ['aws', service.trim(), command?.trim() ?? '', 'help'].filter((part) => part.length > 0).join(' ');
}

export class AwsCliGateway implements CliGateway {
  readonly policy: SecurityPolicy;
  private readonly validator: CommandValidator;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private watcher: SecurityPolicyWatcher | null = null;

  constructor(options: AwsCliGatewayOptions) {
    this.policy = options.policy;
    this.runner = options.runner;
    this.logger = options.logger ?? silentLogger;
    this.validator = new CommandValidator({ policy: this.policy, logger: this.logger });
  }

  /**
   * Build a gateway from configuration: loads the policy file (falling back
   * to defaults), wires the rate limiter and executor, and optionally starts
   * watching the policy file.
   */
  static async create(config: GatewayConfig, options: CreateGatewayOptions = {}): Promise<AwsCliGateway> {
    const logger = options.logger ?? silentLogger;
    const policy = await SecurityPolicy.load({
      mode: config.securityMode,
      path: config.securityConfigPath,
      logger,
    });
    const runner = new CommandExecutor({
      timeoutSeconds: config.timeoutSeconds,
      maxOutputLength: config.maxOutputLength,
      region: config.region,
      profile: config.profile,
      rateLimiter: new RateLimiter({ maxCallsPerSecond: config.maxCallsPerSecond, logger }),
      logger,
    });

    const gateway = new AwsCliGateway({ policy, runner, logger });
    if (config.securityConfigPath && (options.watchPolicy ?? true)) {
      gateway.watchPolicy(config.securityConfigPath);
    }
    logger.info(`Security mode: ${config.securityMode}`);
    return gateway;
  }

  get watchingPolicy(): boolean {
    return this.watcher?.watching ?? false;
  }

  watchPolicy(path: string): void {
    if (this.watcher) return;
    this.watcher = new SecurityPolicyWatcher(this.policy, path);
    this.watcher.start(
      (snapshot) => this.logger.info(`Security policy updated from ${snapshot.source ?? 'built-in defaults'}`),
      (err) => this.logger.error(`Security policy watch failed: ${err.message}`),
    );
  }

  async getHelp(service: string, command?: string, options: ExecuteOptions = {}): Promise<CommandHelpResult> {
    const helpCommand = buildHelpCommand(service, command);
    this.logger.debug(`Retrieving help: ${helpCommand}`);
    try {
      const outcome = this.validator.validateSingle(helpCommand);
      if (!outcome.valid) {
        throw toValidationError(outcome);
      }
      const result = await this.runner.execute(helpCommand, options);
      return { helpText: result.status === 'success' ? result.output : `Error: ${result.output}` };
    } catch (err) {
      if (err instanceof CommandValidationError) {
        return { helpText: `Command validation error: ${err.message}` };
      }
      if (err instanceof CommandExecutionError) {
        return { helpText: `Error retrieving help: ${err.message}` };
      }
      throw err;
    }
  }

  async run(command: string, options: ExecuteOptions = {}): Promise<CommandResult> {
    this.validator.assertValid(command);
    const result = isPipeCommand(command)
      ? await this.runner.executePipeline(command, options)
      : await this.runner.execute(command, options);
    if (result.status === 'error') {
      this.logger.warn(`Command failed: ${command}`);
    }
    return result;
  }

  async isInstalled(): Promise<boolean> {
    try {
      return await this.runner.isInstalled();
    } catch (err) {
      this.logger.debug(`Installation check failed: ${toErrorMessage(err)}`);
      return false;
    }
  }

  close(): void {
    this.watcher?.stop();
    this.watcher = null;
  }
}
