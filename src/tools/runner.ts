/**
 * Tool Runner
 *
 * Spawns the opaque account and execution binaries. Their output is
 * collected as-is and only the exit status is interpreted.
 *
 * @module tools/runner
 */

import { spawn } from 'child_process';
import { join } from 'path';

import { getRuntimeConfig } from '../config/runtime.js';
import { log } from '../debug/index.js';
import { ERROR_CODES, ExternalToolError, createKilnError } from '../errors/index.js';
import type { ToolInvocation, ToolName, ToolOutput, ToolRunner } from './types.js';

/**
 * Executable for a configured tool, prefixed with `tools.toolsDir` when set.
 */
export function toolCommand(name: ToolName): string {
  const tools = getRuntimeConfig().tools;
  const binary = tools[name];
  return tools.toolsDir ? join(tools.toolsDir, binary) : binary;
}

export function formatInvocation(invocation: ToolInvocation): string {
  return [invocation.command, ...invocation.args].join(' ');
}

export const spawnRunner: ToolRunner = (invocation) =>
  new Promise<ToolOutput>((resolve, reject) => {
    const child = spawn(invocation.command, invocation.args, {
      cwd: invocation.cwd,
      env: { ...process.env, ...invocation.env },
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout.on('data', (chunk: Buffer) => {
      stdout.push(chunk);
      log.debug('Tools', chunk.toString('utf8').trimEnd());
    });
    child.stderr.on('data', (chunk: Buffer) => {
      stderr.push(chunk);
      log.debug('Tools', chunk.toString('utf8').trimEnd());
    });
    child.on('error', (err: NodeJS.ErrnoException) => {
      const reason =
        err.code === 'ENOENT' ? 'not found (set KILN_TOOLS_DIR or put it on PATH)' : err.message;
      reject(createKilnError(ERROR_CODES.EXTERNAL_TOOL_FAILED, `Failed to launch ${invocation.command}: ${reason}`));
    });
    child.on('close', (code) => {
      resolve({
        exitCode: code,
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
      });
    });
  });

/**
 * Run a tool and fail with ExternalToolError on a non-zero exit.
 */
export async function runTool(invocation: ToolInvocation, runner: ToolRunner = spawnRunner): Promise<ToolOutput> {
  log.info('Tools', `Running: ${formatInvocation(invocation)}`);
  const output = await runner(invocation);
  if (output.exitCode !== 0) {
    throw new ExternalToolError(invocation.command, invocation.args, output.exitCode, output.stdout, output.stderr);
  }
  return output;
}

/**
 * Run invocations in order, stopping at the first failure.
 */
export async function runTools(invocations: readonly ToolInvocation[], runner: ToolRunner = spawnRunner): Promise<ToolOutput[]> {
  const outputs: ToolOutput[] = [];
  for (const invocation of invocations) {
    outputs.push(await runTool(invocation, runner));
  }
  return outputs;
}
