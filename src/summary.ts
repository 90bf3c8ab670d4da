/**
 * Post-run analysis summary
 */

import { ProjectIndex } from './types.js';

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

function sortedCounts(counts: Record<string, number>): Array<[string, number]> {
  return Object.entries(counts).sort(([a], [b]) => a.localeCompare(b));
}

/**
 * What was indexed, or a warning when nothing was
 */
export function formatSummary(index: ProjectIndex, skippedCount: number, projectRoot: string = index.root): string {
  const { stats } = index;
  const lines: string[] = [];

  if (stats.total_files === 0) {
    lines.push('WARNING: No files were indexed!');
    lines.push('  This might mean:');
    lines.push('  - You are in the wrong directory');
    lines.push('  - All files are in ignored directories');
    lines.push('  - The project has no supported file types');
    lines.push('');
    lines.push(`  Project root: ${projectRoot}`);
    lines.push('  Try running from your project root directory.');
    return lines.join('\n');
  }

  lines.push('Project Analysis Complete:');
  lines.push(`  ${stats.total_directories} directories indexed`);
  lines.push(`  ${stats.total_files} code files found`);
  lines.push(`  ${stats.markdown_files} documentation files analyzed`);

  const parsed = sortedCounts(stats.fully_parsed);
  if (parsed.length > 0) {
    lines.push('');
    lines.push('Languages with full parsing:');
    for (const [lang, count] of parsed) {
      lines.push(`  - ${count} ${capitalize(lang)} files (with signatures)`);
    }
  }

  const listed = sortedCounts(stats.listed_only);
  if (listed.length > 0) {
    lines.push('');
    lines.push('Languages listed only:');
    for (const [lang, count] of listed) {
      lines.push(`  - ${count} ${capitalize(lang)} files`);
    }
  }

  const docs = Object.entries(index.documentation_map).slice(0, 3);
  if (docs.length > 0) {
    lines.push('');
    lines.push('Documentation insights:');
    for (const [docFile, info] of docs) {
      lines.push(`  - ${docFile}: ${info.sections.length} sections`);
    }
  }

  const purposes = Object.entries(index.directory_purposes).slice(0, 5);
  if (purposes.length > 0) {
    lines.push('');
    lines.push('Directory structure:');
    for (const [dirPath, purpose] of purposes) {
      lines.push(`  - ${dirPath}/: ${purpose}`);
    }
  }

  if (skippedCount > 0) {
    lines.push('');
    lines.push(`  (Skipped ${skippedCount} files that are not indexed)`);
  }

  return lines.join('\n');
}
