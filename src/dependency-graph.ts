/**
 * projmap Dependency Graph Resolver
 * Turns raw per-file import strings into intra-project dependency edges
 */

import * as path from 'path';
import { DependencyGraph, FileRecord } from './types.js';

/**
 * Extensions tried, in order, against a resolved base path. The empty
 * extension matches imports that already carry one.
 */
export const RESOLVE_EXTENSIONS = ['.py', '.js', '.ts', '.jsx', '.tsx', ''];

export type ImportResolution =
  | { kind: 'local'; target: string }
  | { kind: 'external'; target: string }
  | { kind: 'unresolved'; base: string };

function normalize(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Base path (no extension) a relative import points at, from the importing
 * file's directory. Ascending past the project root stays at the root.
 */
export function resolveRelativeBase(filePath: string, rawImport: string): string {
  const fileDir = path.posix.dirname(normalize(filePath));

  if (rawImport.startsWith('./')) {
    return path.posix.join(fileDir, rawImport.slice(2));
  }

  if (rawImport.startsWith('../')) {
    const parts = rawImport.split('/');
    const upLevels = parts.filter((p) => p === '..').length;
    let targetDir = fileDir;
    for (let i = 0; i < upLevels; i++) {
      targetDir = path.posix.dirname(targetDir);
    }
    const remaining = parts.filter((p) => p !== '..').join('/');
    return remaining ? path.posix.join(targetDir, remaining) : targetDir;
  }

  // "from . import x" style: the package directory itself
  return fileDir;
}

/**
 * Resolve one raw import string against the set of indexed files
 */
export function resolveImport(
  filePath: string,
  rawImport: string,
  knownFiles: ReadonlySet<string>
): ImportResolution {
  if (!rawImport.startsWith('.')) {
    return { kind: 'external', target: rawImport };
  }

  const base = resolveRelativeBase(filePath, rawImport);
  for (const ext of RESOLVE_EXTENSIONS) {
    const candidate = normalize(base + ext);
    if (knownFiles.has(candidate)) {
      return { kind: 'local', target: candidate };
    }
  }

  return { kind: 'unresolved', base };
}

/**
 * Build the dependency graph. Files whose imports resolve to nothing are
 * left out entirely. Cycles and self-references are kept as found.
 */
export function buildDependencyGraph(files: Record<string, FileRecord>): DependencyGraph {
  const knownFiles = new Set(Object.keys(files).map(normalize));
  const graph: DependencyGraph = {};

  for (const [filePath, record] of Object.entries(files)) {
    if (!record.imports || record.imports.length === 0) continue;

    const dependencies: string[] = [];
    for (const rawImport of record.imports) {
      const resolution = resolveImport(filePath, rawImport, knownFiles);
      if (resolution.kind !== 'unresolved') {
        dependencies.push(resolution.target);
      }
    }

    if (dependencies.length > 0) {
      graph[filePath] = dependencies;
    }
  }

  return graph;
}
