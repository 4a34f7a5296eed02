/**
 * External tools: argument builders, invocation plans and the process runner.
 *
 * @module tools
 */

export type { ToolInvocation, ToolOutput, ToolRunner, ToolName } from './types.js';

export {
  U32_MAX,
  DEFAULT_RAM_SEGMENT_BYTES,
  parseSegmentKind,
  segmentSpecs,
  initAccountsArgs,
  clearSegmentArgs,
  closeSegmentArgs,
  closeVmArgs,
  writeAccountArgs,
  runnerArgs,
  toolEnv,
  type SegmentTarget,
  type ClearSegmentRequest,
  type CloseSegmentRequest,
  type CloseVmRequest,
  type RunnerRequest,
  type ToolEnvSettings,
} from './argv.js';

export { toolCommand, formatInvocation, spawnRunner, runTool, runTools } from './runner.js';

export {
  planAccountsCreate,
  planAccountOperation,
  planInvoke,
  planWeightUpload,
  planStagedWrites,
  accountsToolEnv,
  type PlanOptions,
  type AccountsPlan,
  type SegmentOperation,
  type InvokeRequest,
  type UploadOptions,
} from './plan.js';
