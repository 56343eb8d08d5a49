export { runAll, confirmationPrompt, type RunOptions, type ConfirmationGate } from './updater.js';
export {
  createRunStatistics,
  recordStep,
  finalizeStatistics,
  isBalanced,
  elapsedMs,
  statisticsToJson,
} from './statistics.js';
export type { RunStatistics, StepRecord, SkipReason } from './statistics.js';
export { StepTracker, isTerminal, type StepStatus, type TerminalStatus } from './state.js';
export { formatSummary, closingLine } from './summary.js';
export { installShutdownHandlers } from './shutdown.js';
