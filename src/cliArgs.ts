import { parseArgs } from 'node:util';
import { Errors } from './core/errors.js';
import { isPositiveInteger } from './core/validation.js';
import { JS_MINING_MODES, VERBOSITY_MODES, type JsMiningMode, type Verbosity } from './core/types.js';

export const USAGE = `Usage: env-recon <input-file> [options]

Options:
  --mode <mode>        debug | verbose | discovery | quiet   (default: discovery)
  --jsmode <mode>      pattern | evaluation (aliases: regex | exec)   (default: pattern)
  --concurrency <n>    maximum in-flight requests
  --output <path>      output file (default: env-enum.txt beside the input)
  -h, --help           show this help
`;

const JS_MODE_ALIASES: Record<string, JsMiningMode> = {
  pattern: 'pattern',
  regex: 'pattern',
  evaluation: 'evaluation',
  exec: 'evaluation',
};

function isVerbosity(value: string): value is Verbosity {
  return (VERBOSITY_MODES as readonly string[]).includes(value);
}

export interface CliOptions {
  inputPath: string;
  verbosity: Verbosity;
  jsMode: JsMiningMode;
  concurrency?: number;
  outputPath?: string;
}

/**
 * Parse argv (without node and script); throws InputError on invalid flags
 */
export function parseCliArgs(argv: string[]): CliOptions | 'help' {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      mode: { type: 'string', default: 'discovery' },
      jsmode: { type: 'string', default: 'pattern' },
      concurrency: { type: 'string' },
      output: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) return 'help';

  const inputPath = positionals[0];
  if (!inputPath || positionals.length > 1) {
    throw Errors.invalidNumber('arguments', 'Expected exactly one input file');
  }

  const mode = (values.mode ?? 'discovery').toLowerCase();
  if (!isVerbosity(mode)) throw Errors.invalidOption('mode', VERBOSITY_MODES);

  const jsMode = JS_MODE_ALIASES[(values.jsmode ?? 'pattern').toLowerCase()];
  if (!jsMode) throw Errors.invalidOption('jsmode', [...JS_MINING_MODES, 'regex', 'exec']);

  let concurrency: number | undefined;
  if (values.concurrency !== undefined) {
    concurrency = Number(values.concurrency);
    if (!isPositiveInteger(concurrency)) {
      throw Errors.invalidNumber('concurrency', 'Must be a positive integer');
    }
  }

  return {
    inputPath,
    verbosity: mode,
    jsMode,
    ...(concurrency !== undefined ? { concurrency } : {}),
    ...(values.output ? { outputPath: values.output } : {}),
  };
}
