export { SegmentPlanner, SEGMENT_EPSILON, planSegments, type SegmentPlanStats } from './SegmentPlanner.js';
