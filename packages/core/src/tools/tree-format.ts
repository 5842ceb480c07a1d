import type { FileTreeNode } from '../repository/project-repository.js';

/** Indented 📁/📄 listing, two spaces per level. */
export function renderTree(nodes: FileTreeNode[], depth = 0): string[] {
  const indent = '  '.repeat(depth);
  return nodes.flatMap((node) =>
    node.type === 'folder'
      ? [`${indent}📁 ${node.name}/`, ...renderTree(node.children, depth + 1)]
      : [`${indent}📄 ${node.name}`],
  );
}
