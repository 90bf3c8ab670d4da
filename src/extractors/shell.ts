/**
 * Shell script signature extractor
 */

import { ExtractionResult, SymbolRecord } from '../types.js';
import { braceDepths, findBlockEnd, maskSource, toSymbol } from './common.js';

const MASK_PATTERN = /(?<![$\w{])#[^\n]*|'[^'\n]*'|"(?:\\.|[^"\\\n])*"/g;
const FUNCTION_PATTERN = /^[ \t]*(?:function\s+([\w-]+)\s*(?:\(\s*\))?|([\w-]+)\s*\(\s*\))\s*\{?/gm;
const SOURCE_PATTERN = /^[ \t]*(?:source|\.)\s+["']?([^\s"';]+)/gm;

export function extractShellSignatures(content: string): ExtractionResult {
  const masked = maskSource(content, MASK_PATTERN);
  const depths = braceDepths(masked);

  const declarations: Array<{ name: string; body: string }> = [];
  let match: RegExpExecArray | null;
  FUNCTION_PATTERN.lastIndex = 0;
  while ((match = FUNCTION_PATTERN.exec(masked)) !== null) {
    if (depths[match.index] !== 0) continue;
    const name = match[1] ?? match[2];
    const braceOpen = masked.indexOf('{', match.index);
    const body = braceOpen === -1 ? '' : masked.slice(braceOpen + 1, findBlockEnd(masked, braceOpen));
    declarations.push({ name, body });
  }

  const known = new Set(declarations.map((d) => d.name));
  const functions: Record<string, SymbolRecord> = {};
  for (const { name, body } of declarations) {
    const calls: string[] = [];
    for (const token of body.split(/[\s;|&()`{}]+/)) {
      if (token !== name && known.has(token) && !calls.includes(token)) {
        calls.push(token);
      }
    }
    functions[name] = toSymbol('()', calls);
  }

  const imports: string[] = [];
  SOURCE_PATTERN.lastIndex = 0;
  while ((match = SOURCE_PATTERN.exec(content)) !== null) {
    if (!imports.includes(match[1])) imports.push(match[1]);
  }

  return { functions, classes: {}, imports };
}
