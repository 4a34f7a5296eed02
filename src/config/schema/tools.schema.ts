/**
 * External Tools Config Schema
 *
 * Names (or paths) of the opaque binaries kiln drives for on-chain account
 * management and execution.
 *
 * @module config/schema/tools
 */

export interface ToolsConfigSchema {
  /** Directory prepended to the tool names below (null = resolve from PATH) */
  toolsDir: string | null;
  initAccounts: string;
  accountOps: string;
  writeAccount: string;
  runner: string;
  /** Default chunk size for write_account uploads */
  writeChunkSize: number;
  /** Prefix of the environment variables the tools read (`<prefix>_RPC_URL`, ...) */
  envPrefix: string;
}

export const DEFAULT_TOOLS_CONFIG: ToolsConfigSchema = {
  toolsDir: null,
  initAccounts: 'init_pda_accounts',
  accountOps: 'pda_account_ops',
  writeAccount: 'write_account',
  runner: 'vm-runner',
  writeChunkSize: 900,
  envPrefix: 'VM',
};
