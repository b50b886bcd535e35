#!/usr/bin/env node
import 'dotenv/config';
import { describeError, isFatalError } from './core/errors.js';
import { applyVerbosity, echoesDiscoveries, logger } from './core/logger.js';
import { parseCliArgs, USAGE, type CliOptions } from './cliArgs.js';

async function main(): Promise<number> {
  let options: CliOptions | 'help';
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    process.stderr.write(`${describeError(error)}\n\n${USAGE}`);
    return 1;
  }

  if (options === 'help') {
    process.stdout.write(USAGE);
    return 0;
  }

  applyVerbosity(options.verbosity);

  // Imported after the log level is set so module loggers pick it up
  const { executeRun } = await import('./scan/executeRun.js');

  const controller = new AbortController();
  let interrupts = 0;
  process.on('SIGINT', () => {
    interrupts++;
    if (interrupts > 1) {
      process.exit(130);
    }
    logger.warn('Interrupt received, finishing in-flight requests (Ctrl-C again to exit now)');
    controller.abort();
  });

  const echo = echoesDiscoveries(options.verbosity);

  try {
    const summary = await executeRun({
      inputPath: options.inputPath,
      outputPath: options.outputPath,
      jsMode: options.jsMode,
      concurrency: options.concurrency,
      signal: controller.signal,
      onDiscovery: echo ? (line) => process.stdout.write(`${line}\n`) : undefined,
    });
    logger.info({ summary }, 'Run summary');
    return 0;
  } catch (error) {
    if (isFatalError(error)) {
      logger.fatal({ code: error.code, details: error.details }, error.message);
    } else {
      logger.fatal({ err: error }, 'Run failed');
    }
    return 1;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`${describeError(error)}\n`);
    process.exitCode = 1;
  });
