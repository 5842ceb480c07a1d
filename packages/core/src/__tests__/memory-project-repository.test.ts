import { describe, it, expect } from 'vitest';
import { InMemoryProjectRepository } from '../repository/memory-project-repository.js';

function seeded(): InMemoryProjectRepository {
  const repo = new InMemoryProjectRepository();
  repo.seed('p1', { 'src/main.js': 'x', 'src/lib/util.js': 'y', 'index.html': 'z' });
  return repo;
}

describe('InMemoryProjectRepository', () => {
  it('moves folders with their contents', async () => {
    const repo = seeded();
    expect((await repo.moveFile('p1', 'src', 'app')).ok).toBe(true);
    expect(repo.peek('p1', 'app/lib/util.js')).toBe('y');
    expect(repo.peek('p1', 'src/main.js')).toBeUndefined();
    const tree = await repo.getFileTree('p1');
    expect(tree.ok && tree.value.map((node) => node.path)).toEqual(['app', 'index.html']);
  });

  it('deletes folders recursively', async () => {
    const repo = seeded();
    expect((await repo.deleteFile('p1', 'src')).ok).toBe(true);
    expect(repo.peek('p1', 'src/lib/util.js')).toBeUndefined();
    expect(await repo.getFileTree('p1', 'src')).toEqual({
      ok: false,
      error: { kind: 'repository_failure', message: 'Folder not found: src' },
    });
  });

  it('refuses to write over a folder or the project root', async () => {
    const repo = seeded();
    expect(await repo.writeFile('p1', 'src', 'x')).toEqual({
      ok: false,
      error: { kind: 'repository_failure', message: 'Path is a folder: src' },
    });
    expect(await repo.writeFile('p1', '', 'x')).toEqual({
      ok: false,
      error: { kind: 'repository_failure', message: 'Path is a folder: .' },
    });
  });

  it('reports search-and-replace counts in path order', async () => {
    const repo = new InMemoryProjectRepository();
    repo.seed('p1', { 'b.txt': 'aa', 'a.txt': 'a', '.hidden': 'a' });
    expect(await repo.searchAndReplace('p1', 'a', 'b', undefined, true)).toEqual({
      ok: true,
      value: {
        filesModified: 2,
        totalReplacements: 3,
        files: [
          { path: 'a.txt', occurrences: 1 },
          { path: 'b.txt', occurrences: 2 },
        ],
      },
    });
    expect(repo.peek('p1', 'b.txt')).toBe('aa');
  });

  it('rejects an empty search string', async () => {
    const repo = seeded();
    expect(await repo.searchAndReplace('p1', '', 'x', undefined, false)).toEqual({
      ok: false,
      error: { kind: 'repository_failure', message: 'Search text must not be empty' },
    });
  });
});
