import path from 'path';
import { z } from 'zod';
import type { BitRateSource, VideoMetadata } from '@vsplit/types';
import { logger, getFFprobePath, defaultProcessRunner, type ProcessRunner } from '../../utils/index.js';
import { ProbeError } from '../../domain/index.js';
//------------------------------------------------------------------------------//

/** 비트레이트를 어디서도 찾지 못했을 때 사용하는 값 (2 Mbps) */
export const DEFAULT_BIT_RATE = 2_000_000;
/** 프레임레이트를 읽지 못했을 때 사용하는 값 */
export const DEFAULT_FRAME_RATE = 30;

/**
 * 메타데이터 프로브
 */
export interface MetadataProbe {
  probe(filePath: string): Promise<VideoMetadata>;
}

const numeric = z.union([z.string(), z.number()]).optional();

const FFprobeStreamSchema = z.object({
  codec_type: z.string().optional(),
  width: numeric,
  height: numeric,
  avg_frame_rate: z.string().optional(),
  r_frame_rate: z.string().optional(),
  bit_rate: numeric,
  tags: z.record(z.string(), z.string()).optional(),
});

const FFprobeOutputSchema = z.object({
  streams: z.array(FFprobeStreamSchema).default([]),
  format: z
    .object({
      duration: numeric,
      bit_rate: numeric,
    })
    .optional(),
});

type FFprobeStream = z.infer<typeof FFprobeStreamSchema>;

export interface FFprobeAnalyzerOptions {
  runner?: ProcessRunner;
  ffprobePath?: () => string;
  /** 밀리초, 0이면 무제한 */
  timeout?: number;
}

/**
 * FFprobe 메타데이터 분석기
 *
 * 책임:
 * - FFprobe 실행 및 JSON 출력 검증
 * - 프레임레이트, 비트레이트, 해상도, 길이 추출
 *
 * Infrastructure Layer: 외부 도구(FFprobe)에 대한 직접적인 의존성
 */
export class FFprobeAnalyzer implements MetadataProbe {
  private readonly runner: ProcessRunner;
  private readonly ffprobePath: () => string;
  private readonly timeout: number;

  constructor(options: FFprobeAnalyzerOptions = {}) {
    this.runner = options.runner ?? defaultProcessRunner;
    this.ffprobePath = options.ffprobePath ?? getFFprobePath;
    this.timeout = options.timeout ?? 30_000;
  }

  async probe(filePath: string): Promise<VideoMetadata> {
    if (filePath.includes('\0')) {
      throw new ProbeError(filePath, 'path contains a NUL byte');
    }

    logger.debug('probe', `Probing ${path.basename(filePath)}...`);

    const args = ['-v', 'error', '-show_streams', '-show_format', '-of', 'json', path.resolve(filePath)];

    let stdout: string;
    try {
      const result = await this.runner.run(this.ffprobePath(), args, { timeout: this.timeout, maxBuffer: 4 * 1024 * 1024 });
      if (result.code !== 0) {
        const firstLine = result.stderr.trim().split('\n')[0] || `exit code ${result.code}`;
        throw new ProbeError(filePath, firstLine);
      }
      stdout = result.stdout;
    } catch (error) {
      if (error instanceof ProbeError) {
        throw error;
      }
      throw new ProbeError(filePath, error instanceof Error ? error.message : String(error), { cause: error });
    }

    const metadata = this.parse(filePath, stdout);

    logger.debug(
      'probe',
      `${path.basename(filePath)}: ${metadata.frameRate.toFixed(2)} fps, ` +
        `${(metadata.bitRate / 1_000_000).toFixed(2)} Mbps (${metadata.bitRateSource}), ` +
        `${metadata.resolution.width}x${metadata.resolution.height}, ${metadata.durationSeconds.toFixed(2)}s`
    );

    return metadata;
  }

  /**
   * FFprobe JSON 출력 → VideoMetadata
   */
  parse(filePath: string, stdout: string): VideoMetadata {
    let raw: unknown;
    try {
      raw = JSON.parse(stdout);
    } catch {
      throw new ProbeError(filePath, 'ffprobe output is not valid JSON');
    }

    const parsed = FFprobeOutputSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProbeError(filePath, `unexpected ffprobe output: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    const { streams, format } = parsed.data;
    const videoStream = streams.find(s => s.codec_type === 'video');
    if (!videoStream) {
      throw new ProbeError(filePath, 'No video stream found');
    }

    const width = toPositiveInt(videoStream.width);
    const height = toPositiveInt(videoStream.height);
    if (width === null || height === null) {
      throw new ProbeError(filePath, 'Video stream has no resolution');
    }

    const durationSeconds = toPositiveNumber(format?.duration);
    if (durationSeconds === null) {
      throw new ProbeError(filePath, 'Container has no duration');
    }

    const frameRate = parseFrameRate(videoStream.avg_frame_rate) ?? parseFrameRate(videoStream.r_frame_rate) ?? DEFAULT_FRAME_RATE;
    const { bitRate, bitRateSource } = this.resolveBitRate(filePath, videoStream, toPositiveInt(format?.bit_rate));

    return Object.freeze({
      frameRate,
      bitRate,
      resolution: Object.freeze({ width, height }),
      durationSeconds,
      bitRateSource,
    });
  }

  /**
   * 비트레이트 탐색 순서: stream.bit_rate → stream.tags.BPS (mkv) → format.bit_rate → 기본값
   */
  private resolveBitRate(
    filePath: string,
    stream: FFprobeStream,
    formatBitRate: number | null
  ): { bitRate: number; bitRateSource: BitRateSource } {
    const streamBitRate = toPositiveInt(stream.bit_rate);
    if (streamBitRate !== null) {
      return { bitRate: streamBitRate, bitRateSource: 'stream' };
    }

    const tagBitRate = toPositiveInt(stream.tags?.BPS ?? stream.tags?.['BPS-eng']);
    if (tagBitRate !== null) {
      return { bitRate: tagBitRate, bitRateSource: 'tags' };
    }

    if (formatBitRate !== null) {
      return { bitRate: formatBitRate, bitRateSource: 'format' };
    }

    logger.warn('probe', `Could not determine bit rate of ${path.basename(filePath)}, using default: 2 Mbps`);
    return { bitRate: DEFAULT_BIT_RATE, bitRateSource: 'default' };
  }
}

/**
 * "30000/1001" 또는 "29.97" 형식 파싱, 0 이나 0/0 은 null
 */
export function parseFrameRate(value: string | undefined): number | null {
  if (!value) {
    return null;
  }

  const [numStr, denStr] = value.split('/');
  const num = Number(numStr);
  const den = denStr === undefined ? 1 : Number(denStr);

  if (!Number.isFinite(num) || !Number.isFinite(den) || den === 0) {
    return null;
  }

  const rate = num / den;
  return rate > 0 ? rate : null;
}

function toPositiveNumber(value: string | number | undefined): number | null {
  if (value === undefined) {
    return null;
  }
  const n = typeof value === 'number' ? value : parseFloat(value);
  return Number.isFinite(n) && n > 0 ? n : null;
}

function toPositiveInt(value: string | number | undefined): number | null {
  const n = toPositiveNumber(value);
  if (n === null) {
    return null;
  }
  const rounded = Math.round(n);
  return rounded > 0 ? rounded : null;
}
