export type {
  LocationSample, RoutePoint, RejectReason, SampleDecision, FilterThresholds
} from './gps';
export type {
  WorkoutType, RunCategory, WorkoutSession, ActiveWorkoutSession, CompletedWorkoutSession,
  SessionStatus, LiveMetrics, SessionLiveData, DailyGoalProgress, StreakMetrics,
  CityProgress, ProfileUpdate
} from './workout';
