import { describe, it, expect } from 'vitest';
import { EncoderPlanSchema, type RateControlMode } from '@vsplit/types';
import {
  EncoderParameterSelector,
  selectEncoderPlan,
  InvalidIntentError,
  HARDWARE_CODEC,
  SOFTWARE_CODEC,
} from '../domain/index.js';
import { metadata } from './fakes.js';

describe('EncoderParameterSelector', () => {
  describe('CBR', () => {
    it('never uses hardware, whatever the capability', () => {
      const withHardware = EncoderParameterSelector.select('CBR', 8_500_000, true);
      const withoutHardware = EncoderParameterSelector.select('CBR', 8_500_000, false);

      expect(withHardware).toEqual(withoutHardware);
      expect(withHardware.codec).toBe(SOFTWARE_CODEC);
      expect(withHardware.useHardware).toBe(false);
    });

    it('pins target, ceiling and floor to the source bit rate', () => {
      const plan = EncoderParameterSelector.select('CBR', 8_500_000, false);

      expect(plan.rateControl).toEqual({
        mode: 'CBR',
        bitRate: 8_500_000,
        maxRate: 8_500_000,
        minRate: 8_500_000,
        bufferSize: 1_062_500,
        preset: 'veryslow',
        nalHrd: 'cbr',
        forceConstantFrameRate: true,
      });
      expect(plan.audio).toBe('copy');
    });

    it('floors the buffer size', () => {
      const plan = EncoderParameterSelector.select('CBR', 1_000_001, false);
      expect(plan.rateControl.mode === 'CBR' && plan.rateControl.bufferSize).toBe(125_000);
    });
  });

  describe('VBR', () => {
    it('uses VideoToolbox without a ceiling when hardware is available', () => {
      const plan = EncoderParameterSelector.select('VBR', 8_000_000, true);

      expect(plan).toEqual({
        codec: HARDWARE_CODEC,
        useHardware: true,
        rateControl: { mode: 'VBR', averageBitRate: 8_000_000, bufferSize: null, preset: null },
        audio: 'copy',
      });
    });

    it('falls back to libx264 ABR with a 2x buffer', () => {
      const plan = EncoderParameterSelector.select('VBR', 8_000_000, false);

      expect(plan).toEqual({
        codec: SOFTWARE_CODEC,
        useHardware: false,
        rateControl: { mode: 'VBR', averageBitRate: 8_000_000, bufferSize: 16_000_000, preset: 'medium' },
        audio: 'copy',
      });
    });
  });

  describe('frame rate', () => {
    it('preserves the source frame rate when no target is given', () => {
      const plan = EncoderParameterSelector.select('VBR', 8_000_000, false);

      expect('targetFrameRate' in plan).toBe(false);
      expect(EncoderParameterSelector.effectiveFrameRate(plan, metadata({ frameRate: 29.97 }))).toBe(29.97);
    });

    it('returns the requested target frame rate', () => {
      const plan = selectEncoderPlan('CBR', 8_000_000, false, 60);

      expect(plan.targetFrameRate).toBe(60);
      expect(EncoderParameterSelector.effectiveFrameRate(plan, metadata({ frameRate: 29.97 }))).toBe(60);
    });
  });

  it('reports the bit rate to verify against', () => {
    expect(EncoderParameterSelector.targetBitRate(selectEncoderPlan('CBR', 5_000_000, false))).toBe(5_000_000);
    expect(EncoderParameterSelector.targetBitRate(selectEncoderPlan('VBR', 6_000_000, true))).toBe(6_000_000);
  });

  it.each([0, -1, 1.5, Number.NaN])('rejects source bit rate %s', bitRate => {
    expect(() => EncoderParameterSelector.select('VBR', bitRate, false)).toThrow(InvalidIntentError);
  });

  const combos: Array<[RateControlMode, boolean]> = [
    ['CBR', true],
    ['CBR', false],
    ['VBR', true],
    ['VBR', false],
  ];

  it.each(combos)('produces a schema-valid %s plan (hardware: %s)', (mode, hardware) => {
    expect(EncoderPlanSchema.safeParse(EncoderParameterSelector.select(mode, 4_000_000, hardware, 24)).success).toBe(true);
  });

  it('returns a frozen plan', () => {
    expect(Object.isFrozen(EncoderParameterSelector.select('CBR', 8_000_000, false))).toBe(true);
  });
});
