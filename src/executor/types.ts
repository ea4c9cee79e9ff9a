export type TExecutionResult = {
  /** stdout on success (stderr appended after a marker); stderr on failure */
  output: string;
  /** Set when the script could not be run or exited unsuccessfully */
  error?: string;
};

export type TExecuteOptions = {
  signal?: AbortSignal;
  /** Command-line arguments passed to the script */
  args?: string[];
  /**
   * Extra files placed beside the script, keyed by plain file name. The
   * script sees them in its own directory. Buffers are written byte for byte.
   */
  files?: Record<string, Buffer | string>;
};

/**
 * Runs a Python script in isolation and reports what it printed.
 *
 * A script that fails is not an exception: the failure comes back in
 * `error`. Implementations throw only when the sandbox itself cannot be set
 * up.
 */
export interface ScriptExecutor {
  execute(script: string, options?: TExecuteOptions): Promise<TExecutionResult>;
}
