/**
 * File classification tables: what gets indexed, what gets parsed
 */

import * as path from 'path';

export const IGNORE_DIRS = new Set([
  '.git', 'node_modules', '__pycache__', '.venv', 'venv', 'env',
  'build', 'dist', '.next', 'target', '.idea', '.vscode', 'coverage',
  '.pytest_cache', '.mypy_cache', '.tox', 'vendor', '.cache',
]);

/**
 * Extension -> parser key, for languages with a signature extractor
 */
export const PARSEABLE_LANGUAGES: Record<string, string> = {
  '.py': 'python',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.sh': 'shell',
  '.bash': 'shell',
};

/**
 * Extension -> display language, for every indexed code file
 */
const LANGUAGE_NAMES: Record<string, string> = {
  '.py': 'python',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.sh': 'shell',
  '.bash': 'shell',
  '.go': 'go',
  '.rs': 'rust',
  '.java': 'java',
  '.kt': 'kotlin',
  '.swift': 'swift',
  '.rb': 'ruby',
  '.php': 'php',
  '.c': 'c',
  '.h': 'c',
  '.cpp': 'cpp',
  '.hpp': 'cpp',
  '.cs': 'csharp',
  '.sql': 'sql',
  '.vue': 'vue',
  '.svelte': 'svelte',
};

export const CODE_EXTENSIONS = new Set(Object.keys(LANGUAGE_NAMES));

export const MARKDOWN_EXTENSIONS = new Set(['.md', '.markdown', '.rst']);

export function getLanguageName(extension: string): string {
  return LANGUAGE_NAMES[extension] ?? 'unknown';
}

/**
 * Should this file (relative to the project root) be indexed?
 */
export function shouldIndexFile(relativePath: string): boolean {
  const parts = relativePath.split(/[\\/]/);
  const dirs = parts.slice(0, -1);
  if (dirs.some((part) => IGNORE_DIRS.has(part) || part.startsWith('.'))) {
    return false;
  }

  const ext = path.extname(relativePath).toLowerCase();
  return CODE_EXTENSIONS.has(ext) || MARKDOWN_EXTENSIONS.has(ext);
}
