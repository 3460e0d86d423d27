import {
  silentLogger,
  type CommandHelpResult,
  type CommandResult,
  type ExecuteOptions,
  type Logger,
} from '@aws-cli-gateway/runtime';
import type { ServedGateway } from './cli.js';

export interface FakeGateway extends ServedGateway {
  helpCalls: Array<{ service: string; command?: string; options?: ExecuteOptions }>;
  runCalls: Array<{ command: string; options?: ExecuteOptions }>;
  closed: number;
}

export interface FakeGatewayBehavior {
  help?: (service: string, command?: string) => Promise<CommandHelpResult>;
  run?: (command: string) => Promise<CommandResult>;
  installed?: boolean;
}

/** In-memory CliGateway that records calls instead of spawning the CLI. */
export function createFakeGateway(behavior: FakeGatewayBehavior = {}): FakeGateway {
  const gateway: FakeGateway = {
    helpCalls: [],
    runCalls: [],
    closed: 0,
    async getHelp(service, command, options) {
      gateway.helpCalls.push({ service, command, options });
      return behavior.help ? behavior.help(service, command) : { helpText: `help for ${service}` };
    },
    async run(command, options) {
      gateway.runCalls.push({ command, options });
      return behavior.run ? behavior.run(command) : { status: 'success', output: 'ok' };
    },
    async isInstalled() {
      return behavior.installed ?? true;
    },
    close() {
      gateway.closed += 1;
    },
  };
  return gateway;
}

export interface RecordingLogger extends Logger {
  lines: Array<{ level: string; message: string }>;
}

export function createRecordingLogger(): RecordingLogger {
  const lines: RecordingLogger['lines'] = [];
  const record = (level: string) => (message: string) => {
    lines.push({ level, message });
  };
  return {
    lines,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    setLevel: silentLogger.setLevel,
  };
}
