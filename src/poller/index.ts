export { runCycle } from './cycle';
export type { CycleDeps, CycleOutcome } from './cycle';
export {
  actionsLogger,
  createSessionCancellation,
  createSessionDeps,
  runSession,
  startSession,
} from './loop';
export type {
  CancellationHooks,
  SessionCancellation,
  SessionDeps,
  SessionDepsOptions,
  SessionOutcome,
} from './loop';
export { checkOnce } from './check';
export type { CheckResult } from './check';
