export { SegmentExecutor, type ExecuteOptions } from './SegmentExecutor.js';
export { OutputVerifier, FRAME_RATE_TOLERANCE, BIT_RATE_TOLERANCE } from './OutputVerifier.js';
export { SplitService, type SplitRequest, type SplitRunOptions, type SplitServiceDeps, type PreparedRun } from './SplitService.js';
