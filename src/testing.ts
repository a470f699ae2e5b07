/**
 * Public test utilities, exported from the `"procward/testing"` entry point.
 * Consumers can drive a Launcher without spawning real processes.
 */
export type {
  MockChildHandle,
  MockProcessSpawnerOptions,
} from "./testing/mock-process-spawner.js";
export { MockProcessSpawner } from "./testing/mock-process-spawner.js";
export type { LogEntry } from "./testing/recording-logger.js";
export { RecordingLogger } from "./testing/recording-logger.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
