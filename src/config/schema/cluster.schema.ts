/**
 * Cluster Config Schema
 *
 * Defaults used when an accounts file or project registry does not name
 * a cluster, RPC endpoint, program or payer.
 *
 * @module config/schema/cluster
 */

export interface ClusterConfigSchema {
  /** Cluster moniker recorded in the registry (devnet, testnet, mainnet-beta, localnet) */
  name: string;
  rpcUrl: string;
  /** Base58 id of the VM program that owns derived accounts */
  programId: string;
  /** Payer keypair path, or null to let external tools use their own default */
  payer: string | null;
}

/** Placeholder program id; deployments override it per accounts file. */
export const DEFAULT_PROGRAM_ID = 'FRsToriMLgDc1Ud53ngzHUZvCRoazCaGeGUuzkwoha7m';

export const DEFAULT_CLUSTER_CONFIG: ClusterConfigSchema = {
  name: 'devnet',
  rpcUrl: 'https://api.devnet.solana.com',
  programId: DEFAULT_PROGRAM_ID,
  payer: null,
};
