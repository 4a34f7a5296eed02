/**
 * External Tool Types
 *
 * @module tools/types
 */

export interface ToolInvocation {
  command: string;
  args: string[];
  /** Variables added on top of the parent environment */
  env?: Record<string, string>;
  cwd?: string;
}

export interface ToolOutput {
  /** null when the process was killed by a signal */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/** Runs one invocation to completion. Tests substitute a fake. */
export type ToolRunner = (invocation: ToolInvocation) => Promise<ToolOutput>;

export type ToolName = 'initAccounts' | 'accountOps' | 'writeAccount' | 'runner';
