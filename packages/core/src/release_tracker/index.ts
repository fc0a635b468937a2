export { ReleaseTrackerModule } from './release_tracker';
export { createReleaseTracker } from './create_release_tracker';
export type { ReleaseTrackerFactoryOptions } from './create_release_tracker';
export type {
  CollectResult,
  ReleaseTrackerDependencies,
  RunCounts,
  RunOptions,
  RunResult,
} from './release_tracker.types';
