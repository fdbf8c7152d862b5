import type { FormatWriters } from './types.js';
import { writeBin } from './writeBin.js';
import { writeDebugInfo } from './writeDebugInfo.js';
import { writeIr } from './writeIr.js';

/**
 * Default in-memory artifact writers.
 *
 * These writers implement the `FormatWriters` contract and return artifacts without writing to disk.
 */
export const defaultFormatWriters: FormatWriters = {
  writeBin,
  writeDebugInfo,
  writeIr,
};
