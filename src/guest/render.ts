/**
 * Guest Constants Renderer
 *
 * Emits `config.rs` for a guest template: one `pub const` per value, grouped
 * by concern. Offsets are written in hex.
 *
 * @module guest/render
 */

import { dirname, join } from 'path';

import { log } from '../debug/index.js';
import { NodeBlobIO } from '../converter/io/node.js';
import type { BlobIO } from '../converter/io/types.js';
import { manifestFromText } from '../manifest/loader.js';
import { computeGuestConfig, type GuestConfig, type GuestConfigOptions, type WeightsLocation } from './config.js';

function hex(value: number, width = 0): string {
  return `0x${value.toString(16).toUpperCase().padStart(width, '0')}`;
}

class ConstWriter {
  readonly lines: string[] = [];

  usize(name: string, value: number): void {
    this.lines.push(`pub const ${name}: usize = ${value};`);
  }

  offset(name: string, value: number, width = 0): void {
    this.lines.push(`pub const ${name}: usize = ${hex(value, width)};`);
  }

  u32(name: string, value: number): void {
    this.lines.push(`pub const ${name}: u32 = ${value};`);
  }

  i32(name: string, value: number): void {
    this.lines.push(`pub const ${name}: i32 = ${value};`);
  }

  bool(name: string, value: boolean): void {
    this.lines.push(`pub const ${name}: bool = ${value};`);
  }

  blank(): void {
    this.lines.push('');
  }

  weights(w: WeightsLocation): void {
    this.u32('WEIGHTS_SEG', w.seg);
    this.usize('WEIGHTS_OFFSET', w.offset);
    this.usize('WEIGHTS_DATA_OFFSET', w.dataOffset);
  }

  layerScales(scales: readonly number[]): void {
    scales.forEach((s, i) => this.i32(`W${i + 1}_SCALE_Q16`, s));
  }
}

/**
 * Render the guest configuration as constant declarations. The output ends
 * with a newline.
 */
export function renderGuestConstants(config: GuestConfig): string {
  const w = new ConstWriter();
  w.lines.push('//! Generated guest configuration constants. Do not edit by hand.', '');
  w.offset('CONTROL_OFFSET', config.controlOffset, 4);
  w.usize('INPUT_MAX', config.inputMax);
  w.usize('OUTPUT_MAX', config.outputMax);
  w.blank();
  w.usize('SCRATCH_MIN', config.stack.scratchMin);
  w.usize('RESERVED_TAIL', config.stack.reservedTail);
  w.offset('STACK_GUARD', config.stack.stackGuard);
  w.usize('STACK_PTR', config.stack.stackPtr);

  const m = config.model;
  if (m.template !== 'two_tower' && m.template !== 'custom') {
    w.blank();
    w.usize('INPUT_DIM', m.inputDim);
    if (m.template === 'mlp') w.usize('HIDDEN_DIM', m.hiddenDim);
    w.usize('OUTPUT_DIM', m.outputDim);
    w.blank();
    w.weights(m.weights);
  }

  switch (m.template) {
    case 'linear':
      w.blank();
      w.i32('W_SCALE_Q16', m.wScaleQ16);
      w.bool('HAS_BIAS', m.hasBias);
      break;

    case 'softmax':
    case 'naive_bayes':
      w.blank();
      w.i32('W_SCALE_Q16', m.wScaleQ16);
      w.bool('HAS_BIAS', m.hasBias);
      w.bool('APPLY_SOFTMAX', m.applySoftmax);
      break;

    case 'mlp':
      w.blank();
      w.layerScales(m.scalesQ16);
      w.blank();
      w.offset('HIDDEN_OFFSET', m.hiddenOffset);
      break;

    case 'mlp2':
    case 'mlp3':
      w.blank();
      m.hiddenDims.forEach((d, i) => w.usize(`HIDDEN_DIM${i + 1}`, d));
      w.layerScales(m.scalesQ16);
      w.bool('HAS_BIAS', m.hasBias);
      w.blank();
      m.hiddenOffsets.forEach((o, i) => w.offset(`HIDDEN${i + 1}_OFFSET`, o));
      break;

    case 'cnn1d':
    case 'tiny_cnn':
      w.blank();
      if (m.template === 'cnn1d') {
        w.usize('INPUT_LEN', m.inputLen);
        w.usize('INPUT_CHANNELS', m.inputChannels);
      } else {
        w.usize('INPUT_HEIGHT', m.inputHeight);
        w.usize('INPUT_WIDTH', m.inputWidth);
      }
      w.usize('KERNEL_SIZE', m.kernelSize);
      w.usize('STRIDE', m.stride);
      w.usize('OUT_CHANNELS', m.outChannels);
      w.layerScales(m.scalesQ16);
      w.bool('HAS_BIAS', m.hasBias);
      w.blank();
      w.offset('CONV_OFFSET', m.convOffset);
      break;

    case 'two_tower':
      w.blank();
      w.usize('INPUT_DIM_A', m.inputDimA);
      w.usize('INPUT_DIM_B', m.inputDimB);
      w.usize('EMBED_DIM', m.embedDim);
      w.usize('OUTPUT_DIM', m.outputDim);
      w.blank();
      w.weights(m.weights);
      w.blank();
      w.layerScales(m.scalesQ16);
      w.bool('HAS_BIAS', m.hasBias);
      w.u32('DOT_SHIFT', m.dotShift);
      w.blank();
      w.offset('EMBED_A_OFFSET', m.embedAOffset);
      w.offset('EMBED_B_OFFSET', m.embedBOffset);
      break;

    case 'tree':
      w.blank();
      w.usize('TREE_COUNT', m.treeCount);
      w.usize('TREE_NODE_COUNT', m.treeNodeCount);
      w.usize('TREE_STRIDE', m.treeStride);
      break;

    case 'custom':
      w.blank();
      w.usize('INPUT_BLOB_SIZE', m.inputBlobSize);
      w.usize('OUTPUT_BLOB_SIZE', m.outputBlobSize);
      break;
  }

  w.blank();
  w.lines.push(`pub const EXPECTED_SCHEMA_HASH: u32 = ${hex(config.expectedSchemaHash >>> 0, 8)};`);
  w.u32('EXPECTED_SCHEMA_ID', config.expectedSchemaId);
  w.blank();
  return w.lines.join('\n');
}

/**
 * Default location of the generated constants inside a guest crate.
 */
export function guestConfigPath(guestDir: string): string {
  return join(guestDir, 'src', 'config.rs');
}

/**
 * Compute and write the guest constants for a manifest on disk.
 */
export async function writeGuestConfig(
  manifestPath: string,
  outputPath: string,
  options: GuestConfigOptions = {},
  io: BlobIO = new NodeBlobIO()
): Promise<{ config: GuestConfig; outputPath: string }> {
  const text = await io.readText(manifestPath);
  const { manifest } = manifestFromText(text, manifestPath, { validate: false });
  const config = computeGuestConfig(manifest, options);

  await io.mkdir(dirname(outputPath));
  await io.writeTextAtomic(outputPath, renderGuestConstants(config));
  log.info('Guest', `Wrote ${outputPath} (${config.model.template})`);
  return { config, outputPath };
}
