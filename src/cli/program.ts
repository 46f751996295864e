// The `herald` command: emit one message from a shell script.

import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from '../config/index.js';
import { HeraldError } from '../errors/index.js';
import { BUILTINS, FATAL } from '../informant/descriptor.js';
import { Session } from '../session/index.js';
import type { OutputStream } from '../types/output.js';

export const EXIT_INVALID_INVOCATION = 2;

export interface CliIO {
  stdout: OutputStream;
  stderr: OutputStream;
  exit: (status: number) => void;
  cwd: string;
  env: NodeJS.ProcessEnv;
}

interface CliOptions {
  culprit: string[];
  codicil: string[];
  template: string[];
  sep?: string;
  wrap?: number | true;
  progName?: string;
  logfile?: string;
  quiet?: boolean;
  mute?: boolean;
  verbose?: boolean;
  narrate?: boolean;
  colorscheme?: string;
  streamPolicy?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseWidth(value: string): number {
  const width = Number(value);
  if (!Number.isInteger(width) || width <= 0) {
    throw new InvalidArgumentError('expected a positive integer.');
  }
  return width;
}

/** Keep only the flags that were given, so lower-precedence sources still apply. */
function settingsFlags(options: CliOptions): Record<string, unknown> {
  const flags: Record<string, unknown> = {
    progName: options.progName,
    logfile: options.logfile,
    quiet: options.quiet,
    mute: options.mute,
    verbose: options.verbose,
    narrate: options.narrate,
    colorscheme: options.colorscheme,
    streamPolicy: options.streamPolicy,
  };
  return Object.fromEntries(Object.entries(flags).filter(([, value]) => value !== undefined));
}

export function buildProgram(io: CliIO): Command {
  const program = new Command();

  program
    .name('herald')
    .description('Print a formatted status, warning or error message')
    .version('0.1.0')
    .configureOutput({
      writeOut: (text) => io.stdout.write(text),
      writeErr: (text) => io.stderr.write(text),
    })
    .exitOverride()
    .showHelpAfterError('(run herald --help for usage information)')
    .addHelpText('after', `
Kinds:
  ${[...BUILTINS.keys()].join(', ')}

Examples:
  $ herald warn 'file not found.' --culprit data.in
  $ herald fatal 'bad input.' --prog-name deploy --codicil 'see deploy.cfg'
  $ herald display --template '{0} of {1} done' 3 7
`)
    .argument('<kind>', 'message kind')
    .argument('[words...]', 'message words, joined with the separator')
    .option('-c, --culprit <name>', 'culprit; repeat for a compound culprit', collect, [])
    .option('--codicil <text>', 'continuation line; may repeat', collect, [])
    .option('-t, --template <template>', 'brace template; repeat for fallbacks', collect, [])
    .option('--sep <sep>', 'separator between words')
    .option('-w, --wrap [width]', 'wrap the message (default width 70)', parseWidth)
    .option('--prog-name <name>', 'program name shown in headers')
    .option('--logfile <path>', 'also write the message to this logfile')
    .option('-q, --quiet', 'suppress warnings and informational output')
    .option('-m, --mute', 'suppress all but panics')
    .option('-v, --verbose', 'show comments')
    .option('-n, --narrate', 'show narration')
    .option('--colorscheme <scheme>', 'none, light or dark')
    .option('--stream-policy <policy>', 'termination, header, errors or all')
    .action(async (kind: string, words: string[], options: CliOptions) => {
      let settings;
      try {
        settings = await loadConfig(io.cwd, settingsFlags(options), io.env);
      } catch (err) {
        const message = err instanceof HeraldError ? err.render() : String(err);
        io.stderr.write(`Configuration error: ${message}\n`);
        io.exit(EXIT_INVALID_INVOCATION);
        return;
      }

      const session = new Session({
        ...settings,
        argv: ['herald', kind, ...words],
        stdout: io.stdout,
        stderr: io.stderr,
        exit: io.exit,
        activate: false,
      });

      const descriptor = BUILTINS.get(kind);
      if (!descriptor) {
        session.report({ ...FATAL, terminate: EXIT_INVALID_INVOCATION }, [
          'unknown message kind.',
          { culprit: kind, codicil: `Choose from: ${[...BUILTINS.keys()].join(', ')}.` },
        ]);
        return;
      }

      session.report(descriptor, [
        ...words,
        {
          culprit: options.culprit,
          codicil: options.codicil,
          ...(options.template.length > 0 && { template: options.template }),
          ...(options.sep !== undefined && { sep: options.sep }),
          ...(options.wrap !== undefined && { wrap: options.wrap }),
        },
      ]);
      if (descriptor.terminate === false) session.terminate();
    });

  return program;
}
