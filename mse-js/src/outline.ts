/**
 * MSE Outline — read a document without knowing its schema.
 *
 * Without a schema a text block cannot be told apart from a nested block,
 * so the lines of a text block show up as child keys.
 */

import type { Reader } from './reader.js';

/** One key of a document. */
export interface OutlineNode {
  key: string;
  /** Line the key is on. */
  line: number;
  /** Inline value; absent for keys that open a block. */
  value?: string;
  children: OutlineNode[];
}

/** Read every remaining key of the current block, recursively. */
export function readOutline(reader: Reader): OutlineNode[] {
  const nodes: OutlineNode[] = [];
  while (reader.enterAnyBlock()) {
    const node: OutlineNode = { key: reader.key, line: reader.lineNumber, children: [] };
    if (reader.value !== '') {
      node.value = reader.handle('text', '');
    } else {
      node.children = readOutline(reader);
    }
    reader.exitBlock();
    nodes.push(node);
  }
  return nodes;
}

/**
 * Render an outline as an indented tree.
 *
 * @example
 * ```text
 * title = My set
 * style
 *   border = 2
 * ```
 */
export function formatOutline(nodes: readonly OutlineNode[], depth = 0): string {
  const lines: string[] = [];
  for (const node of nodes) {
    const indent = '  '.repeat(depth);
    lines.push(node.value === undefined ? `${indent}${node.key}` : `${indent}${node.key} = ${node.value}`);
    if (node.children.length > 0) {
      lines.push(formatOutline(node.children, depth + 1));
    }
  }
  return lines.join('\n');
}

/**
 * Convert an outline to a JSON string.
 *
 * @param indent - JSON indentation (default: 2).
 */
export function outlineToJSON(nodes: readonly OutlineNode[], indent = 2): string {
  return JSON.stringify(nodes, null, indent);
}
