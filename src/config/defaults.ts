/**
 * Default Configuration Values
 *
 * Used when no config.toml exists, and for every field a sparse
 * config.toml leaves out. The loader merges user config ON TOP of these.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  markers: {
    start: '-- ASN1START',
    stop: '-- ASN1STOP',
  },

  output: {
    extension: '.asn',
    line_ending: 'lf',
  },

  split: {
    out_dir: 'asn1_sections',
    extension: '.txt',
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.asnx/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# asnx Configuration
# Location: ~/.asnx/config.toml (or $ASNX_HOME/config.toml)

# Block markers
# A line containing the start marker opens a block, a line containing the
# stop marker closes it. Marker lines are never written to the output.
[markers]
start = "${DEFAULT_CONFIG.markers.start}"
stop = "${DEFAULT_CONFIG.markers.stop}"

# asnx extract
# extension replaces everything from the last "." of the input path
[output]
extension = "${DEFAULT_CONFIG.output.extension}"
line_ending = "${DEFAULT_CONFIG.output.line_ending}"  # "lf" or "crlf"

# asnx split
[split]
out_dir = "${DEFAULT_CONFIG.split.out_dir}"
extension = "${DEFAULT_CONFIG.split.extension}"
`;
