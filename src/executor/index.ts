export { execute, missingCommandFromStderr } from './execute.js';
export { targetBinary, expandHome, isBinaryAvailable, isXcodeAvailable } from './resolve.js';
export { isFailure, OUTPUT_TAIL_CHARS, SHELL_NOT_FOUND_EXIT } from './types.js';
export type { ExecutionOutcome, ExecuteOptions, CommandExecutor, OutputStream } from './types.js';
