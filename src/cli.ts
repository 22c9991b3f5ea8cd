#!/usr/bin/env node
/**
 * framesift CLI — extract keyframes and print the manifest as JSON.
 *
 * Exit codes:
 *   0 — success (an empty result included)
 *   1 — usage error or extraction failure
 *   2 — run cancelled or timed out
 */
import { logger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import {
  EXIT_CANCELLED,
  EXIT_FAILURE,
  EXIT_OK,
  exitCodeForError,
  parseCliArgs,
  UsageError,
  USAGE,
  type CliCommand,
} from './cli-args.js';
import { extractVideoKeyframes } from './pipeline/index.js';
import { toManifest } from './pipeline/artifacts.js';

async function main(argv: string[]): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      process.stderr.write(`Error: ${err.message}\n\n${USAGE}\n`);
      return EXIT_FAILURE;
    }
    throw err;
  }

  if (command.kind === 'help') {
    process.stdout.write(`${USAGE}\n`);
    return EXIT_OK;
  }

  const controller = new AbortController();
  const onSigint = () => controller.abort(new Error('Interrupted'));
  process.once('SIGINT', onSigint);

  try {
    const result = await extractVideoKeyframes(command.inputPath, {
      ...command.options,
      signal: controller.signal,
    });
    if (result.status === 'incomplete') {
      process.stderr.write(`Error: keyframe extraction incomplete: ${result.reason}\n`);
      return EXIT_CANCELLED;
    }
    if (result.status === 'exhausted') {
      logger.warn('CLI: no keyframes found', { attempts: result.attempts.map(a => `${a.method}:${a.outcome}`) });
    }
    process.stdout.write(`${JSON.stringify(toManifest(result.keyframes), null, 2)}\n`);
    return EXIT_OK;
  } catch (err) {
    const code = exitCodeForError(err, controller.signal);
    process.stderr.write(code === EXIT_CANCELLED
      ? `Error: keyframe extraction incomplete: ${errorMessage(err)}\n`
      : `Error: ${errorMessage(err)}\n`);
    return code;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error('CLI: unexpected failure', { error: errorMessage(err) });
    process.exitCode = EXIT_FAILURE;
  });
