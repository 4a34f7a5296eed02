/**
 * Deployment commands: upload weights into the weights segment, stage an
 * input and run the VM.
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join, resolve } from 'path';

import { accountsSegmentMetas, loadAccounts, type AccountsDocument } from '../../src/accounts/index.js';
import { DEFAULT_CHUNK_SIZE } from '../../src/config/schema/index.js';
import { chunkManifest } from '../../src/converter/chunk.js';
import { log } from '../../src/debug/index.js';
import { loadManifest } from '../../src/manifest/index.js';
import { planInputStaging } from '../../src/payload/index.js';
import {
  accountsToolEnv,
  formatInvocation,
  planInvoke,
  planStagedWrites,
  planWeightUpload,
  runTools,
  type PlanOptions,
  type ToolInvocation,
} from '../../src/tools/index.js';
import { flagBool, flagInt, flagString, positional } from '../args/index.js';
import type { CLIOptions } from '../helpers/types.js';
import { packInputFile } from './payload.js';

export function planOptionsFromFlags(opts: CLIOptions): PlanOptions {
  return {
    rpcUrl: flagString(opts, 'rpc-url'),
    programId: flagString(opts, 'program-id'),
    payer: flagString(opts, 'payer'),
  };
}

export async function loadAccountsFlag(opts: CLIOptions): Promise<AccountsDocument> {
  return loadAccounts(flagString(opts, 'accounts') ?? 'accounts.toml');
}

/** Print the plan with --dry-run, otherwise run it in order. */
export async function execute(opts: CLIOptions, invocations: readonly ToolInvocation[]): Promise<number> {
  if (flagBool(opts, 'dry-run')) {
    for (const invocation of invocations) {
      console.log(formatInvocation(invocation));
    }
    return 0;
  }
  const outputs = await runTools(invocations);
  for (const output of outputs) {
    if (output.stdout.trim()) console.log(output.stdout.trimEnd());
  }
  return 0;
}

export async function runUpload(opts: CLIOptions): Promise<number> {
  const manifestPath = positional(opts, 0, 'manifest');
  const { manifest } = await loadManifest(manifestPath, { validate: false });
  const blobs = manifest.weights?.blobs ?? [];
  const doc = await loadAccountsFlag(opts);
  const planOptions = planOptionsFromFlags(opts);
  const metas = await accountsSegmentMetas(doc, planOptions);
  const env = await accountsToolEnv(doc, planOptions);

  const chunkSize = flagInt(opts, 'chunk-size');
  const results = await chunkManifest(manifestPath, {
    chunkSize,
    outDir: flagString(opts, 'out-dir') ?? join(dirname(resolve(manifestPath)), 'chunks'),
  });

  const invocations = results.flatMap((result, i) => {
    const blob = blobs[i];
    return planWeightUpload(metas, result.chunks, chunkSize ?? blob?.chunkSize ?? DEFAULT_CHUNK_SIZE, {
      baseOffset: blob?.dataOffset ?? 0,
      writeChunkSize: flagInt(opts, 'write-chunk-size'),
      env,
    });
  });
  log.info('Upload', `${invocations.length} write(s) to the weights segment`);
  return execute(opts, invocations);
}

/**
 * Stage an input into VM scratch and run the guest. Staged bytes are
 * written to a temporary directory that is removed afterwards.
 */
export async function runInvoke(opts: CLIOptions): Promise<number> {
  const manifestPath = positional(opts, 0, 'manifest');
  const { manifest } = await loadManifest(manifestPath, { validate: false });
  const doc = await loadAccountsFlag(opts);
  const planOptions = planOptionsFromFlags(opts);

  const mappedFile = flagString(opts, 'mapped-out') ?? 'mapped_accounts.txt';
  const entryPc = flagInt(opts, 'entry-pc');
  const plan = await planInvoke(
    doc,
    {
      mappedFile,
      instructions: flagInt(opts, 'instructions') ?? manifest.limits.maxInstructions,
      programPath: flagString(opts, 'program-path'),
      entryPc,
      resume: flagBool(opts, 'resume'),
      ramCount: flagInt(opts, 'ram-count'),
      ramBytes: flagInt(opts, 'ram-bytes'),
      computeLimit: flagInt(opts, 'compute-limit') ?? manifest.limits.cuBudget,
    },
    planOptions
  );
  await writeFile(mappedFile, `${plan.metas.mapped.join('\n')}\n`);

  const inputPath = flagString(opts, 'input');
  if (!inputPath) {
    return execute(opts, [plan.invocation]);
  }

  const bytes = await packInputFile(manifest, inputPath, opts);
  const staging = await mkdtemp(join(tmpdir(), 'kiln-stage-'));
  try {
    const writes: { offset: number; path: string }[] = [];
    for (const write of planInputStaging(manifest.abi, bytes)) {
      const path = join(staging, `${write.label}.bin`);
      await writeFile(path, write.data);
      writes.push({ offset: write.offset, path });
    }
    const staged = planStagedWrites(plan.metas.info.vmPubkey, writes, {
      writeChunkSize: flagInt(opts, 'write-chunk-size'),
      env: plan.invocation.env,
    });
    return await execute(opts, [...staged, plan.invocation]);
  } finally {
    await rm(staging, { recursive: true, force: true });
  }
}
