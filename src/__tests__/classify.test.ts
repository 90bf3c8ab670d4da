/**
 * Tests for file filtering, language names and purpose inference
 */

import { describe, it, expect } from 'vitest';
import { getLanguageName, shouldIndexFile } from '../languages.js';
import { inferDirectoryPurpose, inferFilePurpose } from '../purpose.js';

describe('shouldIndexFile', () => {
  it('indexes code and markdown files', () => {
    expect(shouldIndexFile('src/app.py')).toBe(true);
    expect(shouldIndexFile('README.md')).toBe(true);
    expect(shouldIndexFile('lib/core.RS')).toBe(true);
  });

  it('skips ignored and hidden directories and unknown extensions', () => {
    expect(shouldIndexFile('node_modules/pkg/index.js')).toBe(false);
    expect(shouldIndexFile('.github/scripts/release.py')).toBe(false);
    expect(shouldIndexFile('notes.txt')).toBe(false);
  });
});

describe('getLanguageName', () => {
  it('maps extensions to display names', () => {
    expect(getLanguageName('.tsx')).toBe('typescript');
    expect(getLanguageName('.rs')).toBe('rust');
    expect(getLanguageName('.xyz')).toBe('unknown');
  });
});

describe('inferFilePurpose', () => {
  it('recognizes common file roles', () => {
    expect(inferFilePurpose('src/main.py')).toBe('Entry point');
    expect(inferFilePurpose('tests/test_app.py')).toBe('Tests');
    expect(inferFilePurpose('src/app.test.ts')).toBe('Tests');
    expect(inferFilePurpose('lib/string_utils.py')).toBe('Utility functions');
    expect(inferFilePurpose('pkg/__init__.py')).toBe('Package initializer');
  });

  it('returns undefined for anything else', () => {
    expect(inferFilePurpose('src/billing.py')).toBeUndefined();
  });
});

describe('inferDirectoryPurpose', () => {
  it('prefers known directory names', () => {
    expect(inferDirectoryPurpose('src/models', [])).toBe('Data models');
  });

  it('falls back to the directory contents', () => {
    expect(inferDirectoryPurpose('src/pkg', ['__init__.py', 'a.py'])).toBe('Python package: pkg');
    expect(inferDirectoryPurpose('misc', ['test_a.py', 'test_b.py', 'c.py'])).toBe('Test files');
    expect(inferDirectoryPurpose('misc', ['a.md', 'b.md', 'c.py'])).toBe('Documentation');
    expect(inferDirectoryPurpose('misc', ['a.md', 'b.py'])).toBeUndefined();
    expect(inferDirectoryPurpose('misc', [])).toBeUndefined();
  });
});
