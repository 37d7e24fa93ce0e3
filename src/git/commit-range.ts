import { ReferenceNotFoundError } from '../errors.js';
import type { CommitNode, GitBackend } from './backend.js';

export interface RangeCommit {
  id: string;
  summary: string;
}

/**
 * Computes the commits unique to a head ref relative to a base ref.
 *
 * Each candidate reachable from head is tested for ancestry of base on its own
 * rather than cut at the merge base: commits brought into base through a
 * rewriting merge sit "between" base and head in a naive walk but are already
 * part of base's history.
 */
export class CommitRangeResolver {
  constructor(private readonly backend: GitBackend) {}

  /**
   * Commits reachable from `head` that are not ancestors of `base`, oldest first.
   */
  async resolve(base: string, head: string): Promise<RangeCommit[]> {
    const baseId = await this.backend.resolveCommit(base);
    if (!baseId) {
      throw new ReferenceNotFoundError(`Reference '${base}' does not resolve to a commit`, base);
    }
    const headId = await this.backend.resolveCommit(head);
    if (!headId) {
      throw new ReferenceNotFoundError(`Reference '${head}' does not resolve to a commit`, head);
    }
    if (baseId === headId) return [];

    // Iterative post-order DFS over parents: every commit is emitted after its
    // parents, which yields oldest-first order even across merges. Ancestors of
    // base are pruned together with their own history.
    const ordered: RangeCommit[] = [];
    const visited = new Set<string>();
    const stack: Array<{ node: CommitNode; nextParent: number }> = [];

    const enter = async (id: string): Promise<void> => {
      visited.add(id);
      if (await this.backend.isAncestor(id, baseId)) return;
      stack.push({ node: await this.backend.readCommit(id), nextParent: 0 });
    };

    await enter(headId);
    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (!frame) break;
      const parent = frame.node.parents[frame.nextParent];
      if (parent !== undefined) {
        frame.nextParent += 1;
        if (!visited.has(parent)) await enter(parent);
        continue;
      }
      stack.pop();
      ordered.push({ id: frame.node.id, summary: frame.node.summary });
    }

    return ordered;
  }
}
