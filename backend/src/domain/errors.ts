/**
 * 분할 작업 에러 계층
 *
 * 모든 에러는 기계가 읽을 수 있는 code 와 재현에 필요한 details 를 가집니다.
 */
export type SplitterErrorCode = 'PROBE_ERROR' | 'INVALID_INTENT' | 'UNSUPPORTED_MODE' | 'ENCODE_FAILURE' | 'RUN_CANCELLED';

export class SplitterError extends Error {
  readonly code: SplitterErrorCode;
  readonly details: Readonly<Record<string, unknown>>;

  constructor(message: string, code: SplitterErrorCode, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SplitterError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/**
 * 원본 또는 검증 대상 파일을 읽거나 해석할 수 없음
 */
export class ProbeError extends SplitterError {
  constructor(
    readonly filePath: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to probe ${filePath}: ${reason}`, 'PROBE_ERROR', { filePath, reason }, options);
    this.name = 'ProbeError';
  }
}

/**
 * 세그먼트 개수/길이 또는 원본 길이가 잘못됨
 */
export class InvalidIntentError extends SplitterError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'INVALID_INTENT', details);
    this.name = 'InvalidIntentError';
  }
}

export class UnsupportedModeError extends SplitterError {
  constructor(readonly mode: string) {
    super(`Unsupported rate control mode: ${mode}`, 'UNSUPPORTED_MODE', { mode });
    this.name = 'UnsupportedModeError';
  }
}

/**
 * 세그먼트 인코딩 프로세스가 비정상 종료됨
 */
export class EncodeFailureError extends SplitterError {
  readonly segmentIndex: number;
  readonly exitCode: number | null;
  readonly args: readonly string[];
  readonly stderr: string;

  constructor(params: { segmentIndex: number; exitCode: number | null; args: readonly string[]; stderr: string; reason?: string; cause?: unknown }) {
    const reason = params.reason ?? `exit code ${params.exitCode}`;
    super(
      `Segment ${params.segmentIndex} encoding failed (${reason})`,
      'ENCODE_FAILURE',
      { segmentIndex: params.segmentIndex, exitCode: params.exitCode, args: params.args, stderr: params.stderr },
      { cause: params.cause }
    );
    this.name = 'EncodeFailureError';
    this.segmentIndex = params.segmentIndex;
    this.exitCode = params.exitCode;
    this.args = params.args;
    this.stderr = params.stderr;
  }
}

/**
 * 세그먼트 사이에서 취소 신호를 받음
 */
export class RunCancelledError extends SplitterError {
  constructor(
    readonly completedSegments: number,
    readonly totalSegments: number
  ) {
    super(`Run cancelled after ${completedSegments}/${totalSegments} segments`, 'RUN_CANCELLED', { completedSegments, totalSegments });
    this.name = 'RunCancelledError';
  }
}
