export { createRunContext, defaultOutputDir, segmentOutputPath, type RunContextInput } from './RunContext.js';
