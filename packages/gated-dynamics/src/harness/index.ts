export {
  type TrajectoryMetrics,
  evaluateTrajectory,
  evaluateForward,
  evaluateInverse,
} from "./evaluate";
export {
  type TrainingStage,
  type CheckpointMetrics,
  type LocalModelMetrics,
  type RunMetadata,
  type StatsLoggerConfig,
  StatsLogger,
} from "./stats-logger";
