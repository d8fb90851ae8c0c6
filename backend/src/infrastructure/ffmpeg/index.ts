export { FFmpegEncoder, type SegmentEncoder, type EncodeOptions, type FFmpegEncoderOptions } from './FFmpegEncoder.js';
export {
  FFprobeAnalyzer,
  parseFrameRate,
  DEFAULT_BIT_RATE,
  DEFAULT_FRAME_RATE,
  type MetadataProbe,
  type FFprobeAnalyzerOptions,
} from './FFprobeAnalyzer.js';
export {
  HardwareAccelerationDetector,
  type HardwareCapabilityDetector,
  type HardwareAccelerationDetectorOptions,
} from './HardwareAccelerationDetector.js';
