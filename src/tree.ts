/**
 * Compact ASCII directory tree
 */

import * as fs from 'fs';
import * as path from 'path';
import { CODE_EXTENSIONS, IGNORE_DIRS } from './languages.js';

const IMPORTANT_FILES = new Set([
  'README.md', 'package.json', 'requirements.txt', 'Cargo.toml', 'go.mod',
  'pom.xml', 'build.gradle', 'setup.py', 'pyproject.toml', 'Makefile',
]);

function isTreeDirectory(entry: fs.Dirent): boolean {
  return entry.isDirectory() && !IGNORE_DIRS.has(entry.name) && !entry.name.startsWith('.');
}

async function readEntries(dir: string): Promise<fs.Dirent[] | null> {
  try {
    return await fs.promises.readdir(dir, { withFileTypes: true });
  } catch {
    return null;
  }
}

/**
 * Tree lines starting with ".". Directories show their code file count
 * (from `codeFiles`, relative paths with forward slashes); levels deeper than
 * `maxDepth` collapse to "└── ...".
 */
export async function generateTreeStructure(
  root: string,
  codeFiles: string[],
  maxDepth: number
): Promise<string[]> {
  const lines: string[] = ['.'];

  const countFiles = (relDir: string): number => {
    const prefix = `${relDir}/`;
    return codeFiles.filter((f) => f.startsWith(prefix) && CODE_EXTENSIONS.has(path.extname(f))).length;
  };

  const addLevel = async (dir: string, relDir: string, prefix: string, depth: number): Promise<void> => {
    const entries = await readEntries(dir);
    if (!entries) return;

    if (depth > maxDepth) {
      if (entries.some(isTreeDirectory)) {
        lines.push(`${prefix}└── ...`);
      }
      return;
    }

    // Directories first, then files, each alphabetical
    const sorted = [...entries].sort((a, b) => {
      if (a.isFile() !== b.isFile()) return a.isFile() ? 1 : -1;
      return a.name.toLowerCase().localeCompare(b.name.toLowerCase());
    });
    const items = [
      ...sorted.filter(isTreeDirectory),
      ...sorted.filter((e) => e.isFile() && IMPORTANT_FILES.has(e.name)),
    ];

    for (let i = 0; i < items.length; i++) {
      const item = items[i];
      const isLast = i === items.length - 1;
      const relPath = relDir ? `${relDir}/${item.name}` : item.name;

      let label = item.name;
      if (item.isDirectory()) {
        label += '/';
        const count = countFiles(relPath);
        if (count > 0) label += ` (${count} files)`;
      }
      lines.push(`${prefix}${isLast ? '└── ' : '├── '}${label}`);

      if (item.isDirectory()) {
        await addLevel(path.join(dir, item.name), relPath, prefix + (isLast ? '    ' : '│   '), depth + 1);
      }
    }
  };

  await addLevel(root, '', '', 0);
  return lines;
}
