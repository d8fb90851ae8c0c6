import { describe, it, expect } from 'vitest';
import { parseCliArgs } from '../cli/args.js';
import { InvalidIntentError } from '../domain/index.js';

describe('parseCliArgs', () => {
  it('builds a duration request', async () => {
    const options = await parseCliArgs(['movie.mp4', '--duration', '60', '--mode', 'vbr', '--fps', '30']);

    expect(options).toEqual({
      request: {
        sourcePath: 'movie.mp4',
        intent: { kind: 'duration', seconds: 60 },
        mode: 'VBR',
        targetFrameRate: 30,
      },
      dryRun: false,
    });
  });

  it('builds a count request with defaults and strips quotes from the path', async () => {
    const options = await parseCliArgs(['"my video.mp4"', '-n', '4']);

    expect(options.request).toEqual({
      sourcePath: 'my video.mp4',
      intent: { kind: 'count', segments: 4 },
      mode: 'CBR',
    });
  });

  it('accepts an output directory and dry run', async () => {
    const options = await parseCliArgs(['clip.mov', '-d', '30', '-o', '/exports', '--dry-run']);

    expect(options.request.outputDir).toBe('/exports');
    expect(options.dryRun).toBe(true);
  });

  const invalid: Array<[string, string[]]> = [
    ['both split options', ['clip.mov', '--segments', '3', '--duration', '10']],
    ['no split option', ['clip.mov']],
    ['no input', ['--segments', '3']],
    ['an unknown mode', ['clip.mov', '--segments', '3', '--mode', 'crf']],
    ['an unknown option', ['clip.mov', '--segments', '3', '--bogus']],
  ];

  it.each(invalid)('rejects %s', async (_label, args) => {
    await expect(parseCliArgs(args)).rejects.toThrow();
  });

  it('rejects a non-positive frame rate', async () => {
    await expect(parseCliArgs(['clip.mov', '--segments', '3', '--fps', '0'])).rejects.toBeInstanceOf(InvalidIntentError);
  });
});
