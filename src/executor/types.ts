/** Which stream a captured line came from */
export type OutputStream = 'stdout' | 'stderr';

/** Result of running a single command string */
export type ExecutionOutcome =
  | {
      status: 'succeeded';
      exitCode: 0;
      stdout: string;
      stderr: string;
      durationMs: number;
    }
  | {
      status: 'failed';
      exitCode: number | null;
      stdout: string;
      stderr: string;
      error?: string;
      durationMs: number;
    }
  | {
      status: 'not_found';
      binary: string;
      durationMs: number;
    };

export interface ExecuteOptions {
  /** PATH-style list of directories searched for the target binary */
  searchPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Shell used to run the command string */
  shell?: string;
  /** Receives every output line as it arrives */
  onLine?: (line: string, stream: OutputStream) => void;
}

/** Strategy signature steps use to run one command */
export type CommandExecutor = (command: string, options?: ExecuteOptions) => Promise<ExecutionOutcome>;

/** Soft-skips count as success: only `failed` is a failure */
export function isFailure(outcome: ExecutionOutcome): boolean {
  return outcome.status === 'failed';
}

/** Characters of stdout/stderr kept for logging */
export const OUTPUT_TAIL_CHARS = 4096;

/** Exit status the shell reports for a command it cannot find */
export const SHELL_NOT_FOUND_EXIT = 127;
