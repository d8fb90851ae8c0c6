// Domain Layer - 순수 결정 로직 (외부 프로세스 의존성 없음)

export * from './errors.js';
export * from './segment/index.js';
export * from './encoder/index.js';
export * from './run/index.js';
