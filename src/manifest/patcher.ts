/**
 * Manifest Patcher
 *
 * Applies key updates to manifest TOML text while leaving every untouched
 * line byte-for-byte intact. The document is split into table sections,
 * each edit is resolved to a section (or an array-of-tables element picked
 * by a key), and only the affected `key = value` lines are rewritten or
 * appended.
 *
 * @module manifest/patcher
 */

import { rename, writeFile } from 'fs/promises';
import { parse as parseToml, stringify as stringifyToml } from 'smol-toml';

import { ERROR_CODES, ManifestError } from '../errors/index.js';
import { log } from '../debug/index.js';

export type TomlScalar = string | number | boolean;

export interface TablePatch {
  /** Dotted table name, e.g. `schema.custom` or `weights.blobs` */
  table: string;
  /** Select one `[[table]]` element whose key equals this value */
  match?: { key: string; value: TomlScalar };
  set: Record<string, TomlScalar>;
  /** Append the table when absent (plain tables only) */
  createIfMissing?: boolean;
}

interface Section {
  name: string;
  isArray: boolean;
  /** First body line */
  start: number;
  /** One past the last body line */
  end: number;
}

const ARRAY_HEADER_RE = /^\s*\[\[\s*([^\]]+?)\s*\]\]\s*(?:#.*)?$/;
const TABLE_HEADER_RE = /^\s*\[\s*([^\]]+?)\s*\]\s*(?:#.*)?$/;
const KEY_LINE_RE = /^(\s*)([A-Za-z0-9_-]+)\s*=/;

function normalizeName(name: string): string {
  return name
    .split('.')
    .map((part) => part.trim().replace(/^"(.*)"$/, '$1'))
    .join('.');
}

function splitSections(lines: string[]): Section[] {
  const sections: Section[] = [];
  let current: Section = { name: '', isArray: false, start: 0, end: lines.length };

  lines.forEach((line, i) => {
    const arrayMatch = ARRAY_HEADER_RE.exec(line);
    const tableMatch = arrayMatch ? null : TABLE_HEADER_RE.exec(line);
    const match = arrayMatch ?? tableMatch;
    if (!match) return;
    current.end = i;
    sections.push(current);
    current = {
      name: normalizeName(match[1]),
      isArray: arrayMatch !== null,
      start: i + 1,
      end: lines.length,
    };
  });
  sections.push(current);
  return sections;
}

/**
 * Render `value` the way smol-toml writes a scalar.
 */
export function formatTomlScalar(value: TomlScalar): string {
  const line = stringifyToml({ v: value }).trim();
  return line.slice(line.indexOf('=') + 1).trim();
}

function readKeyValue(line: string): unknown {
  try {
    const parsed = parseToml(line);
    const values = Object.values(parsed);
    return values.length === 1 ? values[0] : undefined;
  } catch {
    // multi-line values cannot be read from a single line
    return undefined;
  }
}

function findSection(lines: string[], sections: Section[], patch: TablePatch): Section | undefined {
  const candidates = sections.filter((s) => s.name === patch.table && s.isArray === (patch.match !== undefined));
  if (!patch.match) return candidates[0];

  const { key, value } = patch.match;
  return candidates.find((section) => {
    for (let i = section.start; i < section.end; i++) {
      const m = KEY_LINE_RE.exec(lines[i]);
      if (m && m[2] === key) {
        return readKeyValue(lines[i].trim()) === value;
      }
    }
    return false;
  });
}

function applyToSection(lines: string[], section: Section, set: Record<string, TomlScalar>): string[] {
  const pending = new Map(Object.entries(set));
  let indent: string | null = null;
  const body: string[] = [];

  for (let i = section.start; i < section.end; i++) {
    const line = lines[i];
    const m = KEY_LINE_RE.exec(line);
    if (m) {
      if (indent === null) indent = m[1];
      const value = pending.get(m[2]);
      if (value !== undefined) {
        body.push(`${m[1]}${m[2]} = ${formatTomlScalar(value)}`);
        pending.delete(m[2]);
        continue;
      }
    }
    body.push(line);
  }

  if (pending.size > 0) {
    // New keys go after the last non-blank body line
    let insertAt = body.length;
    while (insertAt > 0 && body[insertAt - 1].trim() === '') insertAt--;
    const added = [...pending].map(([k, v]) => `${indent ?? ''}${k} = ${formatTomlScalar(v)}`);
    body.splice(insertAt, 0, ...added);
  }
  return body;
}

/**
 * Apply patches in order and return the new text.
 */
export function patchManifest(text: string, patches: TablePatch[]): string {
  const eol = text.includes('\r\n') ? '\r\n' : '\n';
  const trailing = text.endsWith('\n');
  let lines = text.split(/\r?\n/);
  if (trailing) lines.pop();

  for (const patch of patches) {
    const sections = splitSections(lines);
    const section = findSection(lines, sections, patch);

    if (!section) {
      if (patch.match) {
        throw new ManifestError(
          ERROR_CODES.MANIFEST_INVALID,
          `[[${patch.table}]] with ${patch.match.key} = ${formatTomlScalar(patch.match.value)} not found in manifest`
        );
      }
      if (!patch.createIfMissing) {
        throw new ManifestError(ERROR_CODES.MANIFEST_INVALID, `${patch.table} table not found in manifest`);
      }
      if (lines.length > 0 && lines[lines.length - 1].trim() !== '') {
        lines.push('');
      }
      lines.push(`[${patch.table}]`);
      for (const [k, v] of Object.entries(patch.set)) {
        lines.push(`${k} = ${formatTomlScalar(v)}`);
      }
      log.debug('Patcher', `Appended [${patch.table}]`);
      continue;
    }

    const body = applyToSection(lines, section, patch.set);
    lines = [...lines.slice(0, section.start), ...body, ...lines.slice(section.end)];
    log.debug('Patcher', `Patched [${patch.table}] keys=${Object.keys(patch.set).join(',')}`);
  }

  return lines.join(eol) + (trailing ? eol : '');
}

/**
 * Write through a temp file and rename.
 */
export async function writeFileAtomic(path: string, data: string | Uint8Array): Promise<void> {
  const tmp = `${path}.${process.pid}.${Date.now()}.tmp`;
  await writeFile(tmp, data);
  await rename(tmp, path);
}
