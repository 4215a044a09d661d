export { DetectionService } from './DetectionService';
export type { CheckTargetOutcome } from './DetectionService';
export { IncidentTracker } from './IncidentTracker';
export type { IncidentTrackerSettings, TrackerOutcome } from './IncidentTracker';
export { AnomalyDetector, RECENT_P95_WINDOW } from './AnomalyDetector';
export { BaselineCalculator } from './BaselineCalculator';
export type { BaselineCache, RecomputeSummary } from './BaselineCalculator';
export {
  TargetRegistry,
  parseFieldUpdate,
  targetCreateSchema,
  targetFieldUpdateSchema,
  anomalyConfigSchema,
} from './TargetRegistry';
export type { AnomalyConfigInput } from './TargetRegistry';
export { applyCheckOutcome, INITIAL_HEALTH } from './stateMachine';
export type {
  AnomalyDecision,
  BaselineProvider,
  HealthState,
  ScheduleListener,
  Transition,
  TransitionContext,
  TransitionEvent,
} from './types';
