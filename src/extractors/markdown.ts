/**
 * Markdown structure extraction: section headers and architecture hints
 */

import * as fs from 'fs';
import { DocumentationEntry } from '../types.js';

const HEADER_PATTERN = /^(#{1,3})\s+(.+?)\s*#*\s*$/;
const ARCHITECTURE_KEYWORDS = /\b(architecture|structure|design|pattern|component|module|layer|directory|folder|organization)\b/i;
const MAX_SECTIONS = 10;
const MAX_HINTS = 5;

export function extractMarkdownStructure(content: string): DocumentationEntry {
  const sections: string[] = [];
  const hints: string[] = [];
  let inFence = false;

  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (line.startsWith('```')) {
      inFence = !inFence;
      continue;
    }
    if (inFence) continue;

    const header = line.match(HEADER_PATTERN);
    if (header) {
      const title = header[2];
      if (sections.length < MAX_SECTIONS) sections.push(title);
      if (ARCHITECTURE_KEYWORDS.test(title) && hints.length < MAX_HINTS) hints.push(title);
    }
  }

  return { sections, architecture_hints: hints };
}

/**
 * Read and extract a markdown file; unreadable files yield an empty entry
 */
export async function extractMarkdownFile(filePath: string): Promise<DocumentationEntry> {
  try {
    const content = await fs.promises.readFile(filePath, 'utf-8');
    return extractMarkdownStructure(content);
  } catch {
    return { sections: [], architecture_hints: [] };
  }
}
