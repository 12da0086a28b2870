/**
 * @stratum/query - EXPLAIN
 *
 * Renders plan trees one node per line:
 *
 * ```
 * Projection: #id, #first_name
 * └── Filter: (#state = 'CO')
 *     └── Scan: employees; projection=*
 * ```
 */

import { formatField, type TableSchema } from '@stratum/core';
import type { LogicalPlan } from './logical-plan.js';
import type { PhysicalPlan } from './physical-plan.js';

/**
 * Minimal shape of a renderable plan node.
 */
export interface ExplainNode {
  toString(): string;
  schema(): TableSchema;
  children(): readonly ExplainNode[];
}

const LAST_BRANCH = '└── ';
const BRANCH = '├── ';
const LAST_INDENT = '    ';
const INDENT = '│   ';

export function formatSchema(schema: TableSchema): string {
  return `[${schema.fields.map(formatField).join(', ')}]`;
}

function label(node: ExplainNode, verbose: boolean): string {
  return verbose ? `${node.toString()}  ${formatSchema(node.schema())}` : node.toString();
}

/**
 * Render `root` and its descendants. Verbose mode appends each node's
 * output schema.
 */
export function explainTree(root: ExplainNode, verbose = false): string {
  const lines = [label(root, verbose)];

  const visit = (node: ExplainNode, prefix: string, last: boolean): void => {
    lines.push(`${prefix}${last ? LAST_BRANCH : BRANCH}${label(node, verbose)}`);
    const childPrefix = prefix + (last ? LAST_INDENT : INDENT);
    const children = node.children();
    children.forEach((child, i) => visit(child, childPrefix, i === children.length - 1));
  };

  const children = root.children();
  children.forEach((child, i) => visit(child, '', i === children.length - 1));
  return lines.join('\n');
}

export function explainLogical(plan: LogicalPlan, verbose = false): string {
  return explainTree(plan, verbose);
}

export function explainPhysical(plan: PhysicalPlan, verbose = false): string {
  return explainTree(plan, verbose);
}
