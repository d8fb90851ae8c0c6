import type { EventEmitter } from 'events';
import { logger } from '../utils/index.js';

const CANCEL_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Ctrl+C / SIGTERM → AbortController
 *
 * 진행 중인 FFmpeg 프로세스는 즉시 종료되고 다음 세그먼트는 시작하지 않습니다.
 * 반환된 함수로 리스너를 해제합니다.
 */
export function cancelOnSignals(controller: AbortController, target: Pick<EventEmitter, 'once' | 'off'> = process): () => void {
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn('system', `Received ${signal}: cancelling current segment...`);
    controller.abort();
  };

  CANCEL_SIGNALS.forEach(signal => target.once(signal, onSignal));

  return () => {
    CANCEL_SIGNALS.forEach(signal => target.off(signal, onSignal));
  };
}
