import { describe, it, expect } from 'vitest';
import { compileExcludes } from './glob.js';

describe('compileExcludes', () => {
  it('returns no matcher and no errors for an empty list', () => {
    expect(compileExcludes([])).toEqual({ matcher: null, errors: [] });
  });

  it('lets a single star cross directory separators', () => {
    const { matcher, errors } = compileExcludes(['*.bak', '*/keep.txt']);

    expect(errors).toEqual([]);
    expect(matcher?.matches('notes.bak')).toBe(true);
    expect(matcher?.matches('nested/dir/notes.bak')).toBe(true);
    expect(matcher?.matches('notes.bak.txt')).toBe(false);
    expect(matcher?.matches('a/b/keep.txt')).toBe(true);
    expect(matcher?.matches('keep.txt')).toBe(false);
  });

  it('tests slash-free patterns against the whole relative path', () => {
    const { matcher } = compileExcludes(['cache']);

    expect(matcher?.matches('cache')).toBe(true);
    expect(matcher?.matches('app/cache')).toBe(false);
    expect(matcher?.matches('cache/x')).toBe(false);
  });

  it('anchors patterns at the walk root', () => {
    const { matcher } = compileExcludes(['build/*.o']);

    expect(matcher?.matches('build/main.o')).toBe(true);
    expect(matcher?.matches('build/obj/main.o')).toBe(true);
    expect(matcher?.matches('src/build/main.o')).toBe(false);
  });

  it('matches dotfiles', () => {
    const { matcher } = compileExcludes(['*']);

    expect(matcher?.matches('.hidden')).toBe(true);
  });

  it('is case-sensitive', () => {
    const { matcher } = compileExcludes(['*.LOG']);

    expect(matcher?.matches('app.log')).toBe(false);
    expect(matcher?.matches('app.LOG')).toBe(true);
  });

  it('treats a leading "!" literally', () => {
    const { matcher } = compileExcludes(['!keep']);

    expect(matcher?.matches('keep')).toBe(false);
    expect(matcher?.matches('!keep')).toBe(true);
  });

  it('matches the empty relative path only with star-only patterns', () => {
    expect(compileExcludes(['*']).matcher?.matches('')).toBe(true);
    expect(compileExcludes(['**']).matcher?.matches('')).toBe(true);
    expect(compileExcludes(['*.txt']).matcher?.matches('')).toBe(false);
  });

  it('reports bad patterns and keeps the rest', () => {
    const { matcher, errors } = compileExcludes(['', '*.tmp']);

    expect(errors).toEqual(['Invalid exclude glob "": pattern is empty']);
    expect(matcher?.matches('a.tmp')).toBe(true);
  });

  it('reports patterns the glob library rejects', () => {
    const tooLong = 'a'.repeat(70 * 1024);
    const { matcher, errors } = compileExcludes([tooLong]);

    expect(matcher).toBeNull();
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatch(/^Invalid exclude glob ".*": .*exceeds maximum allowed length/);
  });
});
