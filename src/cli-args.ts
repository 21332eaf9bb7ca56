/**
 * Command-line parsing for the speaker entry point.
 */

import { parseArgs } from 'node:util';

export const USAGE =
  'Usage: pi-voice-speaker [run | button-test | send-audio <file.wav>] [--debug] [--json-logs] [--env-dir <dir>]';

export type SpeakerCommandName = 'run' | 'button-test' | 'send-audio';

export type CommandLine =
  | { kind: 'help' }
  | { kind: 'usage-error'; message: string }
  | {
      kind: 'command';
      command: SpeakerCommandName;
      args: string[];
      debug: boolean;
      jsonLogs: boolean;
      envDir?: string;
    };

const COMMAND_NAMES: readonly SpeakerCommandName[] = ['run', 'button-test', 'send-audio'];

function isCommandName(value: string): value is SpeakerCommandName {
  return COMMAND_NAMES.some(name => name === value);
}

function isParseArgsError(error: unknown): error is Error & { code: string } {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && error.code.startsWith('ERR_PARSE_ARGS_');
}

function parseOptions(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      debug: { type: 'boolean', default: false },
      'json-logs': { type: 'boolean', default: false },
      'env-dir': { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
}

export function parseCommandLine(argv: string[]): CommandLine {
  let parsed: ReturnType<typeof parseOptions>;
  try {
    parsed = parseOptions(argv);
  } catch (error) {
    if (isParseArgsError(error)) {
      return { kind: 'usage-error', message: error.message };
    }
    throw error;
  }

  const { values, positionals } = parsed;
  if (values.help === true) {
    return { kind: 'help' };
  }

  const [command = 'run', ...args] = positionals;
  if (!isCommandName(command)) {
    return { kind: 'usage-error', message: `Unknown command: ${command}` };
  }

  return {
    kind: 'command',
    command,
    args,
    debug: values.debug === true,
    jsonLogs: values['json-logs'] === true,
    envDir: values['env-dir'],
  };
}
