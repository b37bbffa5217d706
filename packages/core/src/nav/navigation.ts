/**
 * Navigation tree helpers: traversal, leaf listing and text rendering.
 */

import type { NavigationNode, NavLeaf } from '@docsite/types';

export type NavVisitor = (node: NavigationNode, trail: readonly string[]) => void;

/**
 * Depth-first, pre-order walk. `trail` holds the titles of enclosing sections.
 */
export function walkNav(nodes: readonly NavigationNode[], visit: NavVisitor, trail: readonly string[] = []): void {
  for (const node of nodes) {
    visit(node, trail);
    if (node.kind === 'section') {
      walkNav(node.children, visit, [...trail, node.title]);
    }
  }
}

export interface NavLeafEntry {
  leaf: NavLeaf;
  /** Titles of enclosing sections, outermost first */
  trail: readonly string[];
}

/**
 * Every page entry in menu order.
 */
export function collectNavLeaves(nav: readonly NavigationNode[] | null): NavLeafEntry[] {
  const leaves: NavLeafEntry[] = [];
  if (nav) {
    walkNav(nav, (node, trail) => {
      if (node.kind === 'leaf') {
        leaves.push({ leaf: node, trail });
      }
    });
  }
  return leaves;
}

export function countNavPages(nav: readonly NavigationNode[] | null): number {
  return collectNavLeaves(nav).length;
}

/**
 * `nav > Getting Started > About`; untitled pages are shown by path.
 */
export function navLocation(trail: readonly string[], node: NavigationNode): string {
  let label: string;
  if (node.title !== null) {
    label = node.title;
  } else {
    label = node.kind === 'leaf' ? node.path : node.url;
  }
  return ['nav', ...trail, label].join(' > ');
}

/**
 * Indented text tree, two spaces per level:
 *
 * ```
 * Home → index.md
 * Getting Started/
 *   About → getting-started/index.md
 * Chat ↗ https://chat.example.org
 * ```
 */
export function formatNavTree(nav: readonly NavigationNode[] | null): string {
  if (nav === null) {
    return '(navigation generated from docs_dir)';
  }
  if (nav.length === 0) {
    return '(empty navigation)';
  }

  const lines: string[] = [];
  const render = (nodes: readonly NavigationNode[], depth: number): void => {
    const indent = '  '.repeat(depth);
    for (const node of nodes) {
      switch (node.kind) {
        case 'leaf':
          lines.push(node.title === null ? `${indent}${node.path}` : `${indent}${node.title} → ${node.path}`);
          break;
        case 'link':
          lines.push(node.title === null ? `${indent}↗ ${node.url}` : `${indent}${node.title} ↗ ${node.url}`);
          break;
        case 'section':
          lines.push(`${indent}${node.title}/`);
          render(node.children, depth + 1);
          break;
      }
    }
  };
  render(nav, 0);
  return lines.join('\n');
}
