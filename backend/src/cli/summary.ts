import type { JobSummary, RunContext } from '@vsplit/types';
import { EncoderArgs, EncoderParameterSelector } from '../domain/index.js';
import type { PreparedRun } from '../services/index.js';

const mbps = (bitRate: number) => `${(bitRate / 1_000_000).toFixed(2)} Mbps`;
const rule = '='.repeat(80);

function describeSource(context: RunContext): string[] {
  const { metadata } = context;
  return [
    `  File: ${context.sourcePath}`,
    `  Frame rate: ${metadata.frameRate.toFixed(2)} fps`,
    `  Bit rate: ${mbps(metadata.bitRate)}${metadata.bitRateSource === 'default' ? ' (default, not probed)' : ''}`,
    `  Resolution: ${metadata.resolution.width}x${metadata.resolution.height}`,
    `  Duration: ${metadata.durationSeconds.toFixed(2)} seconds`,
  ];
}

/**
 * 인코딩 전 설정 요약
 */
export function formatPlanSummary(prepared: PreparedRun): string[] {
  const { context, ranges, plan } = prepared;
  const frameRate = EncoderParameterSelector.effectiveFrameRate(plan, context.metadata);

  return [
    'Settings Summary:',
    ...describeSource(context),
    `  Output directory: ${context.outputDir}`,
    `  Number of segments: ${ranges.length}`,
    `  Segment duration: ${(ranges[0]?.durationSeconds ?? 0).toFixed(2)} seconds`,
    `  Target frame rate: ${frameRate.toFixed(2)} fps${plan.targetFrameRate === undefined ? ' (source)' : ''}`,
    `  Bit rate control: ${plan.rateControl.mode === 'CBR' ? 'Constant (CBR)' : 'Variable (VBR)'}`,
    `  Encoder: ${EncoderArgs.describe(plan)}`,
    `  Hardware acceleration: ${context.hardwareAvailable ? (plan.useHardware ? 'Used' : 'Available (forced software for CBR)') : 'Not available'}`,
  ];
}

/**
 * 실행 후 작업 요약
 */
export function formatJobSummary(summary: JobSummary): string[] {
  const lines = [rule, 'JOB SUMMARY', rule, '', 'INPUT VIDEO DETAILS:', ...describeSource(summary.context), ''];

  lines.push('OUTPUT DETAILS:');
  lines.push(`  Output directory: ${summary.context.outputDir}`);
  lines.push(`  Segments produced: ${summary.outputs.length}/${summary.ranges.length}`);
  lines.push(`  Encoder: ${EncoderArgs.describe(summary.plan)}`);
  lines.push('');

  lines.push('OUTPUT VERIFICATION:');
  if (summary.verification.status === 'verified') {
    const { result } = summary.verification;
    lines.push(`  Sample file: ${result.samplePath}`);
    lines.push(`  Actual frame rate: ${result.sampledFrameRate.toFixed(2)} fps`);
    lines.push(`  Actual bit rate: ${mbps(result.sampledBitRate)}`);
  } else {
    lines.push(`  Warning: Could not verify output file parameters (${summary.verification.reason})`);
  }
  for (const warning of summary.warnings) {
    lines.push(`  Warning: ${warning.message}`);
  }

  lines.push(rule);
  return lines;
}
