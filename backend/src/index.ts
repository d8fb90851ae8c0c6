#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';
import { HardwareAccelerationDetector, FFmpegEncoder, FFprobeAnalyzer } from './infrastructure/index.js';
import { SplitService } from './services/index.js';
import { SplitterError } from './domain/index.js';
import { logger, setLogLevel, detectFFmpeg, detectFFprobe, console_log } from './utils/index.js';
import { env } from './config/index.js';
import { parseCliArgs } from './cli/args.js';
import { formatJobSummary, formatPlanSummary } from './cli/summary.js';
import { cancelOnSignals } from './cli/cancel.js';
//------------------------------------------------------------------------------//

function createSplitService(): SplitService {
  return new SplitService({
    probe: new FFprobeAnalyzer({ timeout: env.VSPLIT_PROBE_TIMEOUT }),
    detector: new HardwareAccelerationDetector({ preference: env.VSPLIT_ENCODER }),
    encoder: new FFmpegEncoder({ timeout: env.VSPLIT_ENCODE_TIMEOUT }),
  });
}

// 메인 엔트리 포인트
async function main() {
  setLogLevel(env.LOG_LEVEL);

  const { request, dryRun } = await parseCliArgs(hideBin(process.argv));

  await detectFFmpeg();
  await detectFFprobe();

  const service = createSplitService();
  const prepared = await service.prepare(request);
  formatPlanSummary(prepared).forEach(line => console_log(line));

  if (dryRun) {
    prepared.ranges.forEach(r =>
      console_log(`  #${r.index.toString().padStart(3, '0')}  ${r.startSeconds.toFixed(3)}s  +${r.durationSeconds.toFixed(3)}s`)
    );
    return;
  }

  const controller = new AbortController();
  const releaseSignals = cancelOnSignals(controller);

  try {
    const summary = await service.execute(prepared, { signal: controller.signal });
    formatJobSummary(summary).forEach(line => console_log(line));
  } finally {
    releaseSignals();
  }
}

main().catch(error => {
  if (error instanceof SplitterError) {
    logger.error('system', error.message, error.details);
  } else {
    logger.error('system', error instanceof Error ? error.message : String(error));
  }
  process.exitCode = 1;
});
