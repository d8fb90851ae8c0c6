import yargs from 'yargs';
import { RateControlModeSchema, type SplitIntent } from '@vsplit/types';
import { InvalidIntentError } from '../domain/index.js';
import type { SplitRequest } from '../services/index.js';
//------------------------------------------------------------------------------//

export interface CliOptions {
  request: SplitRequest;
  dryRun: boolean;
}

/**
 * 명령줄 인자 → SplitRequest
 *
 * vsplit <input> (--segments N | --duration S) [--fps F] [--mode cbr|vbr] [--output DIR] [--dry-run]
 */
export async function parseCliArgs(args: string[]): Promise<CliOptions> {
  const argv = await yargs(args)
    .scriptName('vsplit')
    .usage('$0 <input> (--segments N | --duration S) [options]')
    .option('segments', { alias: 'n', type: 'number', describe: 'Number of segments to split into' })
    .option('duration', { alias: 'd', type: 'number', describe: 'Duration of each segment in seconds' })
    .option('fps', { type: 'number', describe: 'Output frame rate (default: keep source frame rate)' })
    .option('mode', { type: 'string', choices: ['cbr', 'vbr'] as const, default: 'cbr' as const, describe: 'Bit rate control mode' })
    .option('output', { alias: 'o', type: 'string', describe: 'Output directory (default: <input name>_parts)' })
    .option('dry-run', { type: 'boolean', default: false, describe: 'Print the plan without encoding' })
    .conflicts('segments', 'duration')
    .demandCommand(1, 'Input video path is required')
    .check(parsed => {
      if (parsed.segments === undefined && parsed.duration === undefined) {
        throw new Error('Specify either --segments or --duration');
      }
      return true;
    })
    .strict()
    .version(false)
    .fail((message, error) => {
      throw error ?? new Error(message);
    })
    .parse();

  const sourcePath = String(argv._[0]).trim().replace(/^["']|["']$/g, '');

  let intent: SplitIntent;
  if (argv.segments !== undefined) {
    intent = { kind: 'count', segments: argv.segments };
  } else if (argv.duration !== undefined) {
    intent = { kind: 'duration', seconds: argv.duration };
  } else {
    throw new InvalidIntentError('Specify either --segments or --duration');
  }

  if (argv.fps !== undefined && !(Number.isFinite(argv.fps) && argv.fps > 0)) {
    throw new InvalidIntentError(`Frame rate must be a positive number (got ${argv.fps})`, { fps: argv.fps });
  }

  const request: SplitRequest = {
    sourcePath,
    intent,
    mode: RateControlModeSchema.parse(argv.mode.toUpperCase()),
    ...(argv.fps === undefined ? {} : { targetFrameRate: argv.fps }),
    ...(argv.output === undefined ? {} : { outputDir: argv.output }),
  };

  return { request, dryRun: argv['dry-run'] };
}
