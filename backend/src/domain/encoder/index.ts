export {
  EncoderParameterSelector,
  selectEncoderPlan,
  SOFTWARE_CODEC,
  HARDWARE_CODEC,
} from './EncoderParameterSelector.js';
export { EncoderArgs, type EncodeJob } from './EncoderArgs.js';
