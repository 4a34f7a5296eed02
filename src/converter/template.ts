/**
 * Weight Layout Templates
 *
 * @module converter/template
 */

export const TEMPLATE_NAMES = [
  'linear',
  'softmax',
  'naive_bayes',
  'mlp',
  'mlp2',
  'mlp3',
  'cnn1d',
  'tiny_cnn',
  'two_tower',
  'tree',
] as const;

export type TemplateName = (typeof TEMPLATE_NAMES)[number];

export function isTemplateName(value: unknown): value is TemplateName {
  return typeof value === 'string' && TEMPLATE_NAMES.some((t) => t === value);
}

// Checked in order; the first rule with a matching substring wins.
const LAYOUT_RULES: ReadonlyArray<readonly [TemplateName, readonly string[]]> = [
  ['cnn1d', ['cnn1d', 'conv1d']],
  ['tiny_cnn', ['tiny_cnn', 'cnn2d', 'tinycnn']],
  ['mlp3', ['mlp3']],
  ['mlp2', ['mlp2']],
  ['softmax', ['softmax', 'logreg', 'logistic']],
  ['naive_bayes', ['naive', 'bayes']],
  ['two_tower', ['two_tower', 'twotower', 'two-tower']],
  ['tree', ['tree', 'gbdt']],
  ['linear', ['linear']],
  ['mlp', ['mlp']],
];

/**
 * Map a `weights.layout` string to a template. Returns null when nothing
 * matches.
 */
export function inferTemplate(layout: string | null | undefined): TemplateName | null {
  if (!layout) return null;
  const lower = layout.toLowerCase();
  for (const [template, needles] of LAYOUT_RULES) {
    if (needles.some((n) => lower.includes(n))) {
      return template;
    }
  }
  return null;
}

/** Templates whose single weight tensor is scaled by `w_scale_q16` */
export function isSingleLayer(template: TemplateName): boolean {
  return template === 'linear' || template === 'softmax' || template === 'naive_bayes';
}
