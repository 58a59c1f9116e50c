/**
 * MSE Line Classifier — splits one decoded line into indent, key and value.
 *
 * Line forms:
 *   <tabs><key>:<value>
 *   <tabs><key>:          value on the following, deeper indented lines
 *   <tabs>#comment
 *   (blank)
 */

import { canonicalName } from './names.js';

const TAB_WIDTH = '        ';

export type LineAnomalyKind = 'space-indentation' | 'missing-separator';

export interface LineAnomaly {
  kind: LineAnomalyKind;
  message: string;
}

export interface ClassifiedLine {
  /** Leading tabs, plus one per repaired run of 8 spaces. */
  indent: number;
  /** Canonical key; empty for blank and comment lines. */
  key: string;
  /** Text after the `:`, left-trimmed; empty when there is none. */
  value: string;
  anomalies: LineAnomaly[];
}

/** Whether a line holds nothing but spaces and tabs. */
export function isBlankLine(line: string): boolean {
  return /^[ \t]*$/.test(line);
}

/**
 * Classify a line.
 *
 * @param line - Decoded line without its terminator.
 * @param inText - The line is part of a multi-line text block: take it as it
 *   is, without repairing or reporting anything.
 * @param lenient - Leave space indentation alone: the indent is the tab count
 *   and the spaces are trimmed off the key.
 */
export function classifyLine(line: string, inText = false, lenient = false): ClassifiedLine {
  let indent = 0;
  while (indent < line.length && line[indent] === '\t') {
    indent++;
  }

  if (isBlankLine(line) || line[indent] === '#') {
    return { indent, key: '', value: '', anomalies: [] };
  }

  const anomalies: LineAnomaly[] = [];
  const sep = line.indexOf(':', indent);
  let key = sep === -1 ? line.substring(indent) : line.substring(indent, sep);

  if (!inText && !lenient && key.startsWith(' ')) {
    anomalies.push({
      kind: 'space-indentation',
      message: `key: '${key}' starts with a space; only use TABs for indentation!`,
    });
    while (key.startsWith(TAB_WIDTH)) {
      key = key.substring(TAB_WIDTH.length);
      indent++;
    }
  }

  key = canonicalName(key.trim());

  let value = '';
  if (sep === -1) {
    if (!inText) {
      anomalies.push({ kind: 'missing-separator', message: "Missing ':'" });
    }
  } else {
    value = line.substring(sep + 1).trimStart();
    // A colon makes it a key even when the name is empty.
    if (key === '') key = ' ';
  }

  return { indent, key, value, anomalies };
}
