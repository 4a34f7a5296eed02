/**
 * Manifest text builders shared by the unit tests.
 */

export const MODEL_TOML = `[model]
id = "demo-model"
version = "0.1.0"
arch = "rv64imac"
endianness = "little"
vaddr_bits = 32
`;

export const ABI_TOML = `[abi]
entry = 0x0
control_offset = 0x0
control_size = 64
input_offset = 0x40
input_max = 256
output_offset = 0x140
output_max = 64
scratch_min = 262144
alignment = 4
reserved_tail = 32
`;

export const VECTOR_SCHEMA_TOML = `[schema]
type = "vector"

[schema.vector]
input_dtype = "i32"
input_shape = [4]
output_dtype = "i32"
output_shape = [1]
`;

export const LINEAR_WEIGHTS_TOML = `[weights]
layout = "linear_i8"
quantization = "q8"
dtype = "i8"
header_format = "none"

[[weights.blobs]]
name = "w"
file = "weights.bin"
hash = "sha256:0"
size_bytes = 8
`;

export const SEGMENTS_TOML = `[[segments]]
index = 0
kind = "scratch"
access = "rw"

[[segments]]
index = 1
slot = 1
kind = "weights"
access = "ro"
source = "weights:w"
`;

export const LIMITS_TOML = `[limits]
max_instructions = 1000000
cu_budget = 1400000
`;

export interface ManifestParts {
  model?: string;
  abi?: string;
  schema?: string;
  weights?: string;
  segments?: string;
  limits?: string;
  build?: string;
}

/**
 * Valid manifest text; any part can be swapped out. Pass an empty string to
 * drop a part.
 */
export function manifestText(parts: ManifestParts = {}): string {
  return [
    parts.model ?? MODEL_TOML,
    parts.abi ?? ABI_TOML,
    parts.schema ?? VECTOR_SCHEMA_TOML,
    parts.weights ?? LINEAR_WEIGHTS_TOML,
    parts.segments ?? SEGMENTS_TOML,
    parts.limits ?? LIMITS_TOML,
    parts.build ?? '',
  ]
    .filter((part) => part.length > 0)
    .join('\n');
}
