import type { Idea, IdeaStatus } from '../types';

export type TreeFormat = 'ascii' | 'mermaid';

export interface AncestryIndex {
  roots: Idea[];
  children: Map<string, Idea[]>;
}

/**
 * Parent id to children, built once from the flat list. An idea with several
 * parents is listed under each of them; one whose parents are all absent
 * from the list is a root.
 */
export function buildAncestryIndex(ideas: readonly Idea[]): AncestryIndex {
  const roots: Idea[] = [];
  const children = new Map<string, Idea[]>();
  const known = new Set(ideas.map(i => i.id));

  for (const idea of ideas) {
    const parents = idea.parents.filter(id => known.has(id));
    if (parents.length === 0) {
      roots.push(idea);
      continue;
    }
    for (const parentId of parents) {
      const list = children.get(parentId);
      if (list) list.push(idea);
      else children.set(parentId, [idea]);
    }
  }

  return { roots, children };
}

const STATUS_MARK: Record<IdeaStatus, string> = { active: '*', archived: '~' };

const MAX_DEPTH = 64;

function clip(text: string, max: number): string {
  const chars = [...text];
  return chars.length > max ? `${chars.slice(0, max).join('')}...` : text;
}

export function renderAsciiTree(runId: string, ideas: readonly Idea[], maxDepth: number = MAX_DEPTH): string[] {
  const { roots, children } = buildAncestryIndex(ideas);
  const lines = [`=== Evolution Tree: ${runId} ===`, ''];

  const visit = (idea: Idea, prefix: string, isLast: boolean, depth: number) => {
    const connector = isLast ? '└── ' : '├── ';
    const score = (idea.overallScore ?? 0).toFixed(1);
    lines.push(`${prefix}${connector}${STATUS_MARK[idea.status]} [${score}] ${idea.id} ${clip(idea.title, 40)}`);

    const kids = children.get(idea.id) ?? [];
    if (depth >= maxDepth) {
      if (kids.length > 0) lines.push(`${prefix}${isLast ? '    ' : '│   '}└── ...`);
      return;
    }
    const nextPrefix = prefix + (isLast ? '    ' : '│   ');
    kids.forEach((child, i) => visit(child, nextPrefix, i === kids.length - 1, depth + 1));
  };

  roots.forEach((root, i) => visit(root, '', i === roots.length - 1, 0));

  lines.push('', 'Legend: [score] status id title', '  * = active, ~ = archived');
  return lines;
}

const mermaidId = (id: string) => id.replace(/-/g, '_');
const mermaidText = (text: string) => [...text].slice(0, 25).join('').replace(/"/g, "'");

export function renderMermaidTree(runId: string, ideas: readonly Idea[]): string[] {
  const { children } = buildAncestryIndex(ideas);
  const lines = ['```mermaid', 'flowchart TD', `    subgraph ${mermaidId(runId)}["Evolution: ${runId}"]`];

  for (const idea of ideas) {
    const label = `"${mermaidText(idea.title)}\\n${(idea.overallScore ?? 0).toFixed(1)}"`;
    const id = mermaidId(idea.id);
    lines.push(idea.status === 'active' ? `    ${id}([${label}])` : `    ${id}[${label}]`);
  }

  for (const [parentId, kids] of children) {
    for (const child of kids) {
      lines.push(`    ${mermaidId(parentId)} --> ${mermaidId(child.id)}`);
    }
  }

  lines.push('    end', '    classDef active fill:#90EE90,stroke:#228B22', '    classDef archived fill:#D3D3D3,stroke:#808080');
  for (const idea of ideas) {
    lines.push(`    class ${mermaidId(idea.id)} ${idea.status}`);
  }
  lines.push('```');
  return lines;
}

export function renderTree(runId: string, ideas: readonly Idea[], format: TreeFormat): string[] {
  if (ideas.length === 0) return [`No ideas in run ${runId}`];
  return format === 'mermaid' ? renderMermaidTree(runId, ideas) : renderAsciiTree(runId, ideas);
}
