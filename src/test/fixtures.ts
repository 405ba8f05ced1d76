import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import type { Rule } from '../types.js';

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'dustpan-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Creates files below `root`. Keys ending in `/` are created as empty
 * directories; other keys are files with the given content.
 */
export async function writeTree(root: string, tree: Record<string, string>): Promise<void> {
  for (const [relPath, content] of Object.entries(tree)) {
    const path = join(root, relPath);
    if (relPath.endsWith('/')) {
      await mkdir(path, { recursive: true });
      continue;
    }
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content);
  }
}

export function makeRule(overrides: Partial<Rule> = {}): Rule {
  return {
    id: 'test-rule',
    label: 'Test rule',
    kind: 'paths',
    paths: [],
    requiresSudo: false,
    enabledByDefault: true,
    distros: [],
    excludeGlobs: [],
    ...overrides,
  };
}
