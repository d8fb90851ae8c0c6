import { mkdir } from 'fs/promises';
import path from 'path';
import type {
  EncoderPlan,
  JobSummary,
  RateControlMode,
  RunContext,
  SegmentRange,
  SplitIntent,
  VerificationMismatch,
  VerificationOutcome,
} from '@vsplit/types';
import { logger } from '../../utils/index.js';
import { EncoderParameterSelector, SegmentPlanner, SEGMENT_EPSILON, createRunContext } from '../../domain/index.js';
import type { HardwareCapabilityDetector, MetadataProbe, SegmentEncoder } from '../../infrastructure/index.js';
import { SegmentExecutor, type ExecuteOptions } from './SegmentExecutor.js';
import { OutputVerifier } from './OutputVerifier.js';
//------------------------------------------------------------------------------//

export interface SplitRequest {
  sourcePath: string;
  intent: SplitIntent;
  mode: RateControlMode;
  targetFrameRate?: number;
  /** 없으면 <원본 디렉터리>/<파일명>_parts */
  outputDir?: string;
}

export interface SplitRunOptions {
  signal?: AbortSignal;
  onSegmentComplete?: ExecuteOptions['onSegmentComplete'];
}

/**
 * 인코딩 전에 확정되는 실행 계획
 */
export interface PreparedRun {
  context: RunContext;
  ranges: SegmentRange[];
  plan: EncoderPlan;
}

export interface SplitServiceDeps {
  probe: MetadataProbe;
  detector: HardwareCapabilityDetector;
  encoder: SegmentEncoder;
  /** 출력 디렉터리 생성 */
  ensureDir?: (dir: string) => Promise<void>;
}

const createDir = async (dir: string): Promise<void> => {
  await mkdir(dir, { recursive: true });
};

/**
 * 비디오 분할 서비스
 *
 * 파이프라인: 프로브 → 세그먼트 계획 → 하드웨어 감지 → 컨텍스트 → 인코더 선택
 *          → 출력 디렉터리 → 순차 인코딩 → 검증 → 요약
 *
 * 계획과 선택 단계의 에러는 외부 프로세스를 실행하기 전에 발생합니다 (부작용 없음).
 */
export class SplitService {
  private readonly probe: MetadataProbe;
  private readonly detector: HardwareCapabilityDetector;
  private readonly executor: SegmentExecutor;
  private readonly verifier: OutputVerifier;
  private readonly ensureDir: (dir: string) => Promise<void>;

  constructor(deps: SplitServiceDeps) {
    this.probe = deps.probe;
    this.detector = deps.detector;
    this.executor = new SegmentExecutor(deps.encoder);
    this.verifier = new OutputVerifier(deps.probe);
    this.ensureDir = deps.ensureDir ?? createDir;
  }

  /**
   * 인코딩 없이 계획만 수립
   */
  async prepare(request: SplitRequest): Promise<PreparedRun> {
    logger.info('probe', `Analyzing video: ${request.sourcePath}`);
    const metadata = await this.probe.probe(request.sourcePath);

    const ranges = SegmentPlanner.plan(metadata.durationSeconds, request.intent);
    const stats = SegmentPlanner.getStats(ranges);
    if (stats.hasNegligibleTail) {
      logger.warn(
        'planner',
        `Last segment is ${stats.lastSegmentDuration.toFixed(6)}s (<= ${SEGMENT_EPSILON}s) and will be nearly empty`
      );
    }
    logger.info(
      'planner',
      `Splitting ${metadata.durationSeconds.toFixed(2)}s into ${stats.totalSegments} segment(s) of ` +
        `${stats.nominalSegmentDuration.toFixed(2)}s (last ${stats.lastSegmentDuration.toFixed(2)}s)`
    );

    const hardwareAvailable = await this.detector.detect();

    const context = createRunContext({
      sourcePath: request.sourcePath,
      outputDir: request.outputDir,
      metadata,
      intent: request.intent,
      mode: request.mode,
      targetFrameRate: request.targetFrameRate,
      hardwareAvailable,
    });

    const plan = EncoderParameterSelector.select(context.mode, metadata.bitRate, context.hardwareAvailable, context.targetFrameRate);

    if (context.mode === 'CBR' && context.hardwareAvailable) {
      logger.info('encoder', 'Hardware available but forcing software encoder for CBR');
    }

    return { context, ranges, plan };
  }

  /**
   * 계획된 실행을 수행하고 요약을 반환
   */
  async execute(prepared: PreparedRun, options: SplitRunOptions = {}): Promise<JobSummary> {
    const { context, ranges, plan } = prepared;

    if (ranges.length > 0) {
      await this.ensureDir(context.outputDir);
    }

    const outputs = await this.executor.execute(ranges, plan, context.sourcePath, context.outputDir, {
      signal: options.signal,
      onSegmentComplete: options.onSegmentComplete,
    });

    logger.success('encoder', `Video splitting complete. Output files in: ${path.resolve(context.outputDir)}`);

    const verification = await this.verifier.verifyRun(outputs, plan, context.metadata);
    const warnings = verificationWarnings(verification);
    warnings.forEach(w => logger.warn('verify', w.message));

    return { context, plan, ranges, outputs, verification, warnings };
  }

  async run(request: SplitRequest, options: SplitRunOptions = {}): Promise<JobSummary> {
    const prepared = await this.prepare(request);
    return this.execute(prepared, options);
  }
}

function verificationWarnings(outcome: VerificationOutcome): VerificationMismatch[] {
  return outcome.status === 'verified' ? OutputVerifier.toMismatches(outcome.result) : [];
}
