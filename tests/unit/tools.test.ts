import { Keypair, PublicKey } from '@solana/web3.js';
import { afterEach, describe, expect, it, vi } from 'vitest';

import type { AccountsDocument, AccountsFile } from '../../src/accounts/index.js';
import { resetRuntimeConfig, setRuntimeConfig } from '../../src/config/runtime.js';
import { DEFAULT_PROGRAM_ID } from '../../src/config/schema/index.js';
import { ExternalToolError } from '../../src/errors/index.js';
import {
  clearSegmentArgs,
  closeSegmentArgs,
  closeVmArgs,
  initAccountsArgs,
  planAccountOperation,
  planAccountsCreate,
  planInvoke,
  planWeightUpload,
  runTool,
  runTools,
  runnerArgs,
  segmentSpecs,
  toolCommand,
  toolEnv,
  writeAccountArgs,
  type ToolInvocation,
  type ToolOutput,
} from '../../src/tools/index.js';

const AUTHORITY = Keypair.fromSeed(new Uint8Array(32).fill(5)).publicKey.toBase58();
const OTHER_KEY = new PublicKey(new Uint8Array(32).fill(3)).toBase58();

const rejectKeypairs = async (path: string): Promise<string> => {
  throw new Error(`unexpected keypair lookup: ${path}`);
};

function derivedDoc(): AccountsDocument {
  const accounts: AccountsFile = {
    cluster: { rpcUrl: 'http://localhost:8899' },
    vm: { seed: 7n, authority: AUTHORITY },
    segments: [
      { index: 1, slot: 1, kind: 'weights', writable: false, bytes: 4096 },
      { index: 2, slot: 2, kind: 'ram', writable: true },
    ],
  };
  return { path: '/proj/accounts.toml', accounts };
}

function fakeRunner(...outputs: ToolOutput[]) {
  const queue = [...outputs];
  return vi.fn(async (_invocation: ToolInvocation): Promise<ToolOutput> => {
    const next = queue.shift();
    if (!next) throw new Error('runner called too often');
    return next;
  });
}

afterEach(() => {
  resetRuntimeConfig();
});

describe('argument builders', () => {
  it('builds segment specs for account creation', () => {
    const specs = segmentSpecs([
      { index: 1, slot: 1, kind: 'weights', writable: false, bytes: 4096 },
      { index: 2, slot: 2, kind: 'ram', writable: true },
      { index: 3, slot: 3, kind: 'RAM', writable: true, bytes: 1024 },
      { index: 4, slot: 4, kind: 'custom', writable: false, bytes: 64 },
    ]);
    expect(specs).toEqual(['weights:1:4096', 'ram:2:262144', 'ram:3:1024']);
    expect(initAccountsArgs(42n, specs.slice(0, 2))).toEqual([
      '--vm-seed',
      '42',
      '--segment',
      'weights:1:4096',
      '--segment',
      'ram:2:262144',
    ]);
  });

  it('leaves out a weights segment of unknown size', () => {
    expect(segmentSpecs([{ index: 1, slot: 1, kind: 'weights', writable: false }])).toEqual([]);
  });

  it('checks clear-segment ranges', () => {
    expect(clearSegmentArgs({ seed: 7n, kind: 'ram', slot: 2, offset: 0, length: 0 })).toEqual([
      'clear-segment',
      '--vm-seed',
      '7',
      '--kind',
      'ram',
      '--slot',
      '2',
      '--offset',
      '0',
      '--len',
      '0',
    ]);
    expect(() => clearSegmentArgs({ seed: 7n, kind: 'ram', slot: 2, offset: 8, length: 0 })).toThrow(
      'length=0 requires offset=0'
    );
    expect(() => clearSegmentArgs({ seed: 7n, kind: 'ram', slot: 16, offset: 0, length: 4 })).toThrow(
      'slot must be in range 1..15'
    );
    expect(() => clearSegmentArgs({ seed: 7n, kind: 'ram', slot: 2, offset: 2 ** 32, length: 4 })).toThrow(
      'offset must fit in u32'
    );
  });

  it('passes close recipients through', () => {
    expect(closeSegmentArgs({ seed: 9n, kind: 'weights', slot: 1, recipient: OTHER_KEY })).toEqual([
      'close-segment',
      '--vm-seed',
      '9',
      '--kind',
      'weights',
      '--slot',
      '1',
      '--recipient',
      OTHER_KEY,
    ]);
    expect(closeVmArgs({ seed: 9n })).toEqual(['close-vm', '--vm-seed', '9']);
  });

  it('builds write_account and runner command lines', () => {
    expect(writeAccountArgs('VmKey', 0x10, '/tmp/input.bin', 900)).toEqual([
      'VmKey',
      '16',
      '/tmp/input.bin',
      '--chunk-size',
      '900',
    ]);
    expect(
      runnerArgs({ vmPubkey: 'VmKey', mappedFile: 'mapped.txt', instructions: 50000, entryPc: 0x1000, programId: 'Prog' })
    ).toEqual(['--vm', 'VmKey', '--mapped-file', 'mapped.txt', '--instructions', '50000', '--entry-pc', '0x1000', '--program-id', 'Prog']);
    expect(() => runnerArgs({ vmPubkey: 'VmKey', mappedFile: 'm', instructions: 1, entryPc: 0, resume: true })).toThrow(
      '--entry-pc and --resume are mutually exclusive'
    );
  });

  it('names tool environment variables with the configured prefix', () => {
    expect(toolEnv({ rpcUrl: 'http://localhost:8899', programId: 'Prog' })).toEqual({
      VM_RPC_URL: 'http://localhost:8899',
      VM_PROGRAM_ID: 'Prog',
    });
    expect(toolEnv({ payer: '/keys/payer.json' }, 'TEST')).toEqual({ TEST_PAYER_KEYPAIR: '/keys/payer.json' });
  });

  it('prefixes tool names with the tools directory', () => {
    expect(toolCommand('writeAccount')).toBe('write_account');
    setRuntimeConfig({ tools: { toolsDir: '/opt/kiln/bin' } });
    expect(toolCommand('writeAccount')).toBe('/opt/kiln/bin/write_account');
  });
});

describe('runTool', () => {
  const invocation: ToolInvocation = { command: 'init_pda_accounts', args: ['--vm-seed', '7'] };

  it('returns the output of a successful run', async () => {
    const runner = fakeRunner({ exitCode: 0, stdout: 'created\n', stderr: '' });
    await expect(runTool(invocation, runner)).resolves.toEqual({ exitCode: 0, stdout: 'created\n', stderr: '' });
    expect(runner).toHaveBeenCalledWith(invocation);
  });

  it('surfaces a failing exit verbatim', async () => {
    const runner = fakeRunner({ exitCode: 2, stdout: '', stderr: 'boom\n' });
    const err = await runTool(invocation, runner).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ExternalToolError);
    if (!(err instanceof ExternalToolError)) return;
    expect(err.exitCode).toBe(2);
    expect(err.stderr).toBe('boom\n');
    expect(err.message).toBe('init_pda_accounts exited with code 2\nboom');
  });

  it('stops a sequence at the first failure', async () => {
    const runner = fakeRunner(
      { exitCode: 0, stdout: '', stderr: '' },
      { exitCode: 1, stdout: 'partial', stderr: '' },
      { exitCode: 0, stdout: '', stderr: '' }
    );
    await expect(runTools([invocation, invocation, invocation], runner)).rejects.toThrow(
      'init_pda_accounts exited with code 1\npartial'
    );
    expect(runner).toHaveBeenCalledTimes(2);
  });
});

describe('invocation plans', () => {
  it('plans account creation from a derived accounts file', async () => {
    const plan = await planAccountsCreate(derivedDoc(), { resolveKeypair: rejectKeypairs });
    expect(plan.invocation).toEqual({
      command: 'init_pda_accounts',
      args: ['--vm-seed', '7', '--segment', 'weights:1:4096', '--segment', 'ram:2:262144'],
      env: {
        VM_RPC_URL: 'http://localhost:8899',
        VM_PROGRAM_ID: DEFAULT_PROGRAM_ID,
        VM_AUTHORITY_PUBKEY: AUTHORITY,
      },
    });
  });

  it('refuses a payer that is not the authority', async () => {
    const resolveKeypair = vi.fn(async (): Promise<string> => OTHER_KEY);
    await expect(
      planAccountsCreate(derivedDoc(), { resolveKeypair, payer: '/keys/payer.json' })
    ).rejects.toThrow('account creation authority differs from payer signer');
    expect(resolveKeypair).toHaveBeenCalledWith('/keys/payer.json');
  });

  it('requires a seed for segment operations', async () => {
    const doc: AccountsDocument = {
      path: '/proj/accounts.toml',
      accounts: {
        cluster: {},
        vm: { pubkey: OTHER_KEY },
        segments: [{ index: 1, slot: 1, kind: 'weights', writable: false, pubkey: AUTHORITY }],
      },
    };
    await expect(planAccountOperation(doc, { op: 'close-vm' }, { resolveKeypair: rejectKeypairs })).rejects.toThrow(
      'accounts operation requires vm.seed (derived mode)'
    );
  });

  it('plans a clear of the ram segment', async () => {
    const plan = await planAccountOperation(
      derivedDoc(),
      { op: 'clear-segment', kind: 'ram', slot: 2, offset: 0, length: 0 },
      { resolveKeypair: rejectKeypairs }
    );
    expect(plan.invocation.command).toBe('pda_account_ops');
    expect(plan.invocation.args).toEqual([
      'clear-segment',
      '--vm-seed',
      '7',
      '--kind',
      'ram',
      '--slot',
      '2',
      '--offset',
      '0',
      '--len',
      '0',
    ]);
  });

  it('keeps the runner from allocating ram when segments are writable', async () => {
    const plan = await planInvoke(
      derivedDoc(),
      { mappedFile: 'mapped.txt', instructions: 100 },
      { resolveKeypair: rejectKeypairs }
    );
    expect(plan.invocation.command).toBe('vm-runner');
    expect(plan.invocation.args).toEqual([
      '--vm',
      plan.metas.info.vmPubkey,
      '--mapped-file',
      'mapped.txt',
      '--instructions',
      '100',
      '--ram-count',
      '0',
      '--rpc',
      'http://localhost:8899',
      '--program-id',
      DEFAULT_PROGRAM_ID,
    ]);
  });

  it('writes each chunk at the next offset of the weights segment', async () => {
    const plan = await planInvoke(derivedDoc(), { mappedFile: 'm', instructions: 1 }, { resolveKeypair: rejectKeypairs });
    const weights = plan.metas.segments[0].pubkey;

    const writes = planWeightUpload(plan.metas, ['/c/w_chunk0.bin', '/c/w_chunk1.bin'], 1024, { baseOffset: 12 });

    expect(writes.map((w) => w.args)).toEqual([
      [weights, '12', '/c/w_chunk0.bin', '--chunk-size', '900'],
      [weights, '1036', '/c/w_chunk1.bin', '--chunk-size', '900'],
    ]);
    expect(writes[0].command).toBe('write_account');
  });
});
