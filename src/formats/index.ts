import type { FormatWriters } from './types.js';
import { writeAsm } from './writeAsm.js';
import { writeJson } from './writeJson.js';

/**
 * Default in-memory artifact writers.
 *
 * Implements `FormatWriters`; artifacts are returned in memory, never written to disk.
 */
export const defaultFormatWriters: FormatWriters = {
  writeJson,
  writeAsm,
};
