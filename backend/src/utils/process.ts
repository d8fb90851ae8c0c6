import { spawn } from 'child_process';
//------------------------------------------------------------------------------//

export interface ProcessOptions {
  /** 0 또는 미지정이면 타임아웃 없음 */
  timeout?: number;
  maxBuffer?: number;
  signal?: AbortSignal;
}

export interface ProcessResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

/**
 * 외부 프로세스 실행기
 *
 * FFmpeg/FFprobe 호출은 모두 이 인터페이스를 거칩니다.
 * 종료 코드가 0이 아니어도 resolve 하며, 판단은 호출자가 합니다.
 * 실행 실패, 타임아웃, 취소, 버퍼 초과만 reject 됩니다.
 */
export interface ProcessRunner {
  run(command: string, args: readonly string[], options?: ProcessOptions): Promise<ProcessResult>;
}

export class ProcessTimeoutError extends Error {
  constructor(
    readonly command: string,
    readonly timeout: number
  ) {
    super(`${command} timeout after ${timeout}ms`);
    this.name = 'ProcessTimeoutError';
  }
}

export class ProcessAbortedError extends Error {
  constructor(readonly command: string) {
    super(`${command} aborted`);
    this.name = 'ProcessAbortedError';
  }
}

/**
 * 저수준 spawn 래퍼
 */
export function spawnProcess(command: string, args: readonly string[], options: ProcessOptions = {}): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(new ProcessAbortedError(command));
      return;
    }

    const child = spawn(command, [...args], {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let settled = false;
    let timeoutHandle: NodeJS.Timeout | null = null;

    const finish = (action: () => void) => {
      if (settled) {
        return;
      }
      settled = true;
      if (timeoutHandle) clearTimeout(timeoutHandle);
      options.signal?.removeEventListener('abort', onAbort);
      action();
    };

    const onAbort = () => {
      child.kill('SIGKILL');
      finish(() => reject(new ProcessAbortedError(command)));
    };

    // 타임아웃 설정
    if (options.timeout && options.timeout > 0) {
      const timeout = options.timeout;
      timeoutHandle = setTimeout(() => {
        child.kill('SIGKILL');
        finish(() => reject(new ProcessTimeoutError(command, timeout)));
      }, timeout);
    }

    options.signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
      // 버퍼 크기 제한
      if (options.maxBuffer && stdout.length > options.maxBuffer) {
        child.kill('SIGKILL');
        finish(() => reject(new Error(`${command} output exceeded maxBuffer`)));
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', error => {
      finish(() => reject(error));
    });

    child.on('close', (code, signal) => {
      finish(() => resolve({ code, signal, stdout, stderr }));
    });
  });
}

export const defaultProcessRunner: ProcessRunner = {
  run: spawnProcess,
};
