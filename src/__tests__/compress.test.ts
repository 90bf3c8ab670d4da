/**
 * Tests for the size governor
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { compressIndexIfNeeded, measureIndex, TRUNCATION_MARKER } from '../compress.js';
import { stringifyIndex } from '../storage.js';
import { createMockFile, createMockIndex, sig } from './helpers.js';
import type { ProjectIndex } from '../types.js';

function treeOf(lines: number): string[] {
  return ['.', ...Array.from({ length: lines - 1 }, (_, i) => `├── dir${i}/ (${i} files)`)];
}

function withTree(index: ProjectIndex, tree: string[]): ProjectIndex {
  return { ...index, project_structure: { ...index.project_structure, tree } };
}

describe('measureIndex', () => {
  it('is the byte length of the pretty-printed snapshot', () => {
    const index = createMockIndex({ 'café.py': createMockFile() });
    expect(measureIndex(index)).toBe(Buffer.byteLength(stringifyIndex(index), 'utf-8'));
  });
});

describe('compressIndexIfNeeded', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the index untouched when within budget', () => {
    const index = createMockIndex({ 'a.py': createMockFile() });
    const { index: result, report } = compressIndexIfNeeded(index, measureIndex(index));

    expect(result).toBe(index);
    expect(report.treeTruncated).toBe(false);
    expect(report.removedFiles).toEqual([]);
  });

  it('truncates the tree to 100 lines plus a marker before dropping files', () => {
    const index = createMockIndex(
      {
        'main.py': createMockFile({ functions: { main: sig('()') } }),
        'notes.go': createMockFile({ language: 'go', parsed: false }),
      },
      { project_structure: { type: 'tree', root: '.', tree: treeOf(150) } }
    );
    const truncated = [...treeOf(150).slice(0, 100), TRUNCATION_MARKER];
    const budget = measureIndex(withTree(index, truncated));

    const { index: result, report } = compressIndexIfNeeded(index, budget);

    expect(result.project_structure.tree).toHaveLength(101);
    expect(result.project_structure.tree[100]).toBe('... (truncated)');
    expect(result.project_structure.tree[99]).toBe('├── dir98/ (98 files)');
    expect(report.treeTruncated).toBe(true);
    expect(report.removedFiles).toEqual([]);
    expect(Object.keys(result.files)).toEqual(['main.py', 'notes.go']);
  });

  it('leaves a tree of 100 lines or fewer alone', () => {
    const index = createMockIndex(
      { 'a.py': createMockFile() },
      { project_structure: { type: 'tree', root: '.', tree: treeOf(100) } }
    );

    const { index: result, report } = compressIndexIfNeeded(index, 10);

    expect(report.treeTruncated).toBe(false);
    expect(result.project_structure.tree).toEqual(treeOf(100));
  });

  it('drops unparsed files one at a time until under budget', () => {
    const parsed = createMockFile({ functions: { run: sig('()') } });
    const index = createMockIndex({
      'a.py': parsed,
      'b.go': createMockFile({ language: 'go', parsed: false }),
      'c.go': createMockFile({ language: 'go', parsed: false }),
    });
    const budget = measureIndex({
      ...index,
      files: { 'a.py': parsed, 'c.go': createMockFile({ language: 'go', parsed: false }) },
    });

    const { index: result, report } = compressIndexIfNeeded(index, budget);

    expect(report.removedFiles).toEqual(['b.go']);
    expect(Object.keys(result.files)).toEqual(['a.py', 'c.go']);
    expect(report.finalSize).toBe(budget);
  });

  it('never drops parsed files and accepts an oversized result', () => {
    const index = createMockIndex({
      'a.py': createMockFile({ functions: { run: sig('()') } }),
      'b.go': createMockFile({ language: 'go', parsed: false }),
    });

    const { index: result, report } = compressIndexIfNeeded(index, 10);

    expect(Object.keys(result.files)).toEqual(['a.py']);
    expect(report.removedFiles).toEqual(['b.go']);
    expect(report.finalSize).toBeGreaterThan(10);
    expect(report.finalSize).toBe(measureIndex(result));
  });

  it('does not modify the input index', () => {
    const index = createMockIndex(
      {
        'a.py': createMockFile(),
        'b.go': createMockFile({ language: 'go', parsed: false }),
      },
      { project_structure: { type: 'tree', root: '.', tree: treeOf(120) } }
    );

    compressIndexIfNeeded(index, 10);

    expect(Object.keys(index.files)).toEqual(['a.py', 'b.go']);
    expect(index.project_structure.tree).toHaveLength(120);
  });
});
