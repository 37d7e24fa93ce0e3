import { describe, it, expect, beforeEach } from 'vitest';
import { CommitRangeResolver } from '../src/git/commit-range.js';
import { ReferenceNotFoundError } from '../src/errors.js';
import { FakeGitBackend } from './helpers/fake-git-backend.js';

describe('CommitRangeResolver', () => {
  let git: FakeGitBackend;
  let resolver: CommitRangeResolver;

  beforeEach(() => {
    git = new FakeGitBackend('main');
    git.commit('Base work', { 'base.txt': 'base\n' });
    resolver = new CommitRangeResolver(git);
  });

  it('returns the commits unique to head, oldest first', async () => {
    git.fork('feature');
    const a = git.commit('Add a', { 'a.txt': 'a\n' });
    const b = git.commit('Add b', { 'b.txt': 'b\n' });
    git.switchTo('main');
    git.commit('Upstream change', { 'up.txt': 'up\n' });

    const commits = await resolver.resolve('main', 'feature');

    expect(commits).toEqual([
      { id: a, summary: 'Add a' },
      { id: b, summary: 'Add b' },
    ]);
  });

  it('returns an empty list when both refs name the same commit', async () => {
    git.fork('feature');

    expect(await resolver.resolve('main', 'feature')).toEqual([]);
    expect(await resolver.resolve('main', 'main')).toEqual([]);
  });

  it('returns an empty list when head is already contained in base', async () => {
    git.fork('feature');
    git.commit('Add a', { 'a.txt': 'a\n' });
    git.switchTo('main');
    git.merge('Merge feature', 'feature');

    expect(await resolver.resolve('main', 'feature')).toEqual([]);
  });

  it('excludes commits that reached base through another path', async () => {
    git.fork('topic');
    const shared = git.commit('Shared fix', { 'fix.txt': 'fix\n' });
    git.switchTo('main');
    git.fork('feature');
    const x = git.commit('Feature work', { 'x.txt': 'x\n' });
    const merge = git.merge('Merge topic into feature', 'topic');
    git.switchTo('main');
    git.merge('Merge topic into main', 'topic');

    const commits = await resolver.resolve('main', 'feature');

    expect(commits.map((c) => c.id)).toEqual([x, merge]);
    expect(commits.map((c) => c.id)).not.toContain(shared);
  });

  it('orders both sides of a merge before the merge itself', async () => {
    git.fork('side');
    const s = git.commit('Side work', { 's.txt': 's\n' });
    git.switchTo('main');
    git.fork('feature');
    const f = git.commit('Feature work', { 'f.txt': 'f\n' });
    const m = git.merge('Merge side', 'side');

    const commits = await resolver.resolve('main', 'feature');

    expect(commits.map((c) => c.id)).toEqual([f, s, m]);
  });

  it('fails when the base does not resolve', async () => {
    await expect(resolver.resolve('missing', 'main')).rejects.toThrow(ReferenceNotFoundError);
    await expect(resolver.resolve('missing', 'main')).rejects.toMatchObject({ ref: 'missing' });
  });

  it('fails when the head does not resolve', async () => {
    await expect(resolver.resolve('main', 'gone')).rejects.toMatchObject({
      name: 'ReferenceNotFoundError',
      ref: 'gone',
      message: "Reference 'gone' does not resolve to a commit",
    });
  });
});
