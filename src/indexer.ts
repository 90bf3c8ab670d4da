/**
 * projmap Index Builder
 * Walks the project, extracts per-file records and assembles the snapshot
 */

import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import {
  ExtractionResult,
  FileRecord,
  IndexStats,
  ProjectIndex,
  ProjmapConfig,
} from './types.js';
import { getConfig } from './config.js';
import { IndexBuildError, errorMessage } from './errors.js';
import {
  IGNORE_DIRS,
  MARKDOWN_EXTENSIONS,
  PARSEABLE_LANGUAGES,
  getLanguageName,
  shouldIndexFile,
} from './languages.js';
import { inferDirectoryPurpose, inferFilePurpose } from './purpose.js';
import { generateTreeStructure } from './tree.js';
import { buildDependencyGraph } from './dependency-graph.js';
import { buildCallGraph } from './call-graph.js';
import { extractMarkdownFile } from './extractors/markdown.js';
import { extractPythonSignatures } from './extractors/python.js';
import { extractJavaScriptSignatures } from './extractors/javascript.js';
import { extractShellSignatures } from './extractors/shell.js';

const STALENESS_DAYS = 7;

export interface BuildOptions {
  config?: ProjmapConfig;
  verbose?: boolean;
  now?: Date;
}

export interface BuildResult {
  index: ProjectIndex;
  skippedCount: number;    // Files present but not indexable
}

const EXTRACTORS: Record<string, (content: string) => ExtractionResult> = {
  python: extractPythonSignatures,
  javascript: extractJavaScriptSignatures,
  typescript: extractJavaScriptSignatures,
  shell: extractShellSignatures,
};

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

function inIgnoredDir(relativePath: string): boolean {
  return relativePath.split('/').some((part) => IGNORE_DIRS.has(part));
}

/**
 * Epoch seconds one week before `now`
 */
export function stalenessThreshold(now: Date): number {
  return Math.floor(now.getTime() / 1000) - STALENESS_DAYS * 24 * 60 * 60;
}

/**
 * Extract one parseable file. The record is only upgraded to parsed when the
 * extractor finds a function or class.
 */
async function parseFile(
  absolutePath: string,
  parserKey: string,
  record: FileRecord
): Promise<void> {
  const extract = EXTRACTORS[parserKey];
  const content = await fs.promises.readFile(absolutePath, 'utf-8');
  const extracted = extract(content);

  if (Object.keys(extracted.functions).length > 0 || Object.keys(extracted.classes).length > 0) {
    record.functions = extracted.functions;
    record.classes = extracted.classes;
    record.imports = extracted.imports;
    record.parsed = true;
  }
}

/**
 * Build the full snapshot for `root`
 */
export async function buildIndex(root: string, options: BuildOptions = {}): Promise<BuildResult> {
  const config = options.config ?? getConfig();
  const verbose = options.verbose ?? config.verbose;
  const now = options.now ?? new Date();
  const rootDir = path.resolve(root);

  try {
    await fs.promises.readdir(rootDir);
  } catch (error) {
    throw new IndexBuildError(`Cannot read project root ${rootDir}: ${errorMessage(error)}`, { cause: error });
  }

  // ==========================================================================
  // File discovery
  // ==========================================================================

  if (verbose) {
    console.log('Indexing files...');
  }

  const entries = await glob('**/*', {
    cwd: rootDir,
    dot: true,
    mark: true,
    ignore: [...IGNORE_DIRS].map((dir) => `**/${dir}/**`),
  });
  entries.sort();

  const stats: IndexStats = {
    total_files: 0,
    total_directories: 0,
    fully_parsed: {},
    listed_only: {},
    markdown_files: 0,
  };
  const files: Record<string, FileRecord> = {};
  const documentationMap: ProjectIndex['documentation_map'] = {};
  const directoryFiles = new Map<string, string[]>();
  let skippedCount = 0;

  for (const entry of entries) {
    if (entry.endsWith('/')) {
      const relDir = entry.slice(0, -1);
      if (!inIgnoredDir(relDir)) {
        stats.total_directories++;
        directoryFiles.set(relDir, []);
      }
      continue;
    }

    if (stats.total_files >= config.maxFiles) {
      console.warn(`Stopping at ${config.maxFiles} files (project too large)`);
      break;
    }

    if (!shouldIndexFile(entry)) {
      skippedCount++;
      continue;
    }

    directoryFiles.get(path.posix.dirname(entry))?.push(path.posix.basename(entry));

    const absolutePath = path.join(rootDir, entry);
    const ext = path.extname(entry).toLowerCase();

    if (MARKDOWN_EXTENSIONS.has(ext)) {
      const doc = await extractMarkdownFile(absolutePath);
      if (doc.sections.length > 0 || doc.architecture_hints.length > 0) {
        documentationMap[entry] = doc;
        stats.markdown_files++;
      }
      continue;
    }

    const language = getLanguageName(ext);
    const record: FileRecord = { language, parsed: false };
    const purpose = inferFilePurpose(entry);
    if (purpose) record.purpose = purpose;

    const parserKey = PARSEABLE_LANGUAGES[ext];
    if (parserKey) {
      try {
        await parseFile(absolutePath, parserKey, record);
        increment(stats.fully_parsed, parserKey);
      } catch (error) {
        if (verbose) {
          console.warn(`  Could not parse ${entry}: ${errorMessage(error)}`);
        }
        increment(stats.listed_only, language);
      }
    } else {
      increment(stats.listed_only, language);
    }

    files[entry] = record;
    stats.total_files++;

    if (verbose && stats.total_files % 100 === 0) {
      console.log(`  Indexed ${stats.total_files} files...`);
    }
  }

  // ==========================================================================
  // Directory purposes
  // ==========================================================================

  const directoryPurposes: Record<string, string> = {};
  for (const [relDir, names] of directoryFiles) {
    if (names.length === 0 || relDir === '.') continue;
    const purpose = inferDirectoryPurpose(relDir, names);
    if (purpose) directoryPurposes[relDir] = purpose;
  }

  // ==========================================================================
  // Tree, dependency graph, call graph
  // ==========================================================================

  if (verbose) {
    console.log('Building directory tree...');
  }
  const tree = await generateTreeStructure(rootDir, Object.keys(files), config.maxTreeDepth);

  if (verbose) {
    console.log('Building dependency graph...');
  }
  const dependencyGraph = buildDependencyGraph(files);

  if (verbose) {
    console.log('Building call graph...');
  }
  const callGraph = buildCallGraph(files);

  const index: ProjectIndex = {
    indexed_at: now.toISOString(),
    root,
    project_structure: { type: 'tree', root: '.', tree },
    documentation_map: documentationMap,
    directory_purposes: directoryPurposes,
    stats,
    files: callGraph.files,
    dependency_graph: dependencyGraph,
    staleness_check: stalenessThreshold(now),
  };

  return { index, skippedCount };
}
