import { describe, it, expect } from 'vitest';
import {
  SplitterError,
  ProbeError,
  InvalidIntentError,
  UnsupportedModeError,
  EncodeFailureError,
  RunCancelledError,
} from '../domain/index.js';

describe('SplitterError hierarchy', () => {
  it('carries a code and details', () => {
    const error = new ProbeError('/media/a.mp4', 'No video stream found');

    expect(error).toBeInstanceOf(SplitterError);
    expect(error.name).toBe('ProbeError');
    expect(error.code).toBe('PROBE_ERROR');
    expect(error.details).toEqual({ filePath: '/media/a.mp4', reason: 'No video stream found' });
    expect(error.toString()).toBe('ProbeError [PROBE_ERROR]: Failed to probe /media/a.mp4: No video stream found');
  });

  it('keeps the reproduction info of a failed encode', () => {
    const cause = new Error('spawn failed');
    const error = new EncodeFailureError({ segmentIndex: 4, exitCode: null, args: ['-i', 'a.mp4'], stderr: '', reason: 'spawn failed', cause });

    expect(error.message).toBe('Segment 4 encoding failed (spawn failed)');
    expect(error.code).toBe('ENCODE_FAILURE');
    expect(error.details).toEqual({ segmentIndex: 4, exitCode: null, args: ['-i', 'a.mp4'], stderr: '' });
    expect(error.cause).toBe(cause);
  });

  const cases: Array<[SplitterError, string, string]> = [
    [new InvalidIntentError('bad'), 'INVALID_INTENT', 'bad'],
    [new UnsupportedModeError('CRF'), 'UNSUPPORTED_MODE', 'Unsupported rate control mode: CRF'],
    [new RunCancelledError(2, 5), 'RUN_CANCELLED', 'Run cancelled after 2/5 segments'],
  ];

  it.each(cases)('%s', (error, code, message) => {
    expect(error).toBeInstanceOf(SplitterError);
    expect(error.code).toBe(code);
    expect(error.message).toBe(message);
  });
});
