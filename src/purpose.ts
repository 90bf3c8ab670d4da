/**
 * Purpose inference for files and directories from naming conventions
 */

import * as path from 'path';

/**
 * Directory name -> purpose
 */
export const DIRECTORY_PURPOSES: Record<string, string> = {
  api: 'API endpoints and route handlers',
  routes: 'Application routes',
  controllers: 'Request controllers',
  models: 'Data models',
  schemas: 'Data schemas and validation',
  services: 'Business logic services',
  utils: 'Utility functions',
  helpers: 'Helper functions',
  lib: 'Shared library code',
  components: 'UI components',
  pages: 'Page components',
  views: 'View templates',
  hooks: 'Hooks',
  config: 'Configuration',
  scripts: 'Build and utility scripts',
  tests: 'Test files',
  test: 'Test files',
  __tests__: 'Test files',
  docs: 'Documentation',
  migrations: 'Database migrations',
  middleware: 'Middleware',
  types: 'Type definitions',
  cli: 'Command-line interface',
  static: 'Static assets',
  public: 'Public assets',
};

const FILE_PURPOSE_PATTERNS: Array<[RegExp, string]> = [
  [/^(index|main|app|server)\.\w+$/, 'Entry point'],
  [/^__init__\.py$/, 'Package initializer'],
  [/^(test_.*|.*_test|.*\.(test|spec))\.\w+$/, 'Tests'],
  [/^(config|settings|conf)\b.*\.\w+$/, 'Configuration'],
  [/^setup\.py$/, 'Package setup'],
  [/^(cli|__main__)\.\w+$/, 'Command-line interface'],
  [/(^|[_.-])(util|utils|helpers?)\.\w+$/, 'Utility functions'],
  [/(^|[_.-])models?\.\w+$/, 'Data models'],
  [/(^|[_.-])(routes?|urls)\.\w+$/, 'Route definitions'],
  [/(^|[_.-])types?\.\w+$/, 'Type definitions'],
  [/(^|[_.-])constants?\.\w+$/, 'Constants'],
];

export function inferFilePurpose(filePath: string): string | undefined {
  const name = path.basename(filePath).toLowerCase();
  for (const [pattern, purpose] of FILE_PURPOSE_PATTERNS) {
    if (pattern.test(name)) return purpose;
  }
  return undefined;
}

/**
 * Known directory names win; otherwise look at what the directory holds
 */
export function inferDirectoryPurpose(dirPath: string, files: string[]): string | undefined {
  const name = path.basename(dirPath).toLowerCase();
  const known = DIRECTORY_PURPOSES[name];
  if (known) return known;

  if (files.length === 0) return undefined;

  const testFiles = files.filter((f) => inferFilePurpose(f) === 'Tests');
  if (testFiles.length > files.length / 2) return 'Test files';

  if (files.includes('__init__.py')) return `Python package: ${path.basename(dirPath)}`;

  const docs = files.filter((f) => /\.(md|markdown|rst)$/i.test(f));
  if (docs.length > files.length / 2) return 'Documentation';

  return undefined;
}
