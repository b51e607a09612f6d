export { executeSyncCommand, parseSyncArgs, exitCodeFor, EXIT_OK, EXIT_FATAL, EXIT_GATE_FAILED } from './sync.js';
export type { SyncCommandArgs } from './sync.js';
export { executeCheckCommand } from './check.js';
export { executeFlakyCommand, parseFlakyArgs } from './flaky.js';
export type { FlakyCommandArgs } from './flaky.js';
export { executeServeCommand } from './serve.js';
