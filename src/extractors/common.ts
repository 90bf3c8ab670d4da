/**
 * Helpers shared by the regex signature extractors
 */

import { SymbolRecord } from '../types.js';

/**
 * Replace the contents of comments and string literals with spaces, keeping
 * offsets and newlines intact, so declaration and brace scans do not trip
 * over code-like text inside them.
 */
export function maskSource(content: string, pattern: RegExp): string {
  return content.replace(pattern, (match) => {
    const open = match[0] === '#' || match.startsWith('//') || match.startsWith('/*') ? '' : match[0];
    let masked = '';
    for (let i = 0; i < match.length; i++) {
      const ch = match[i];
      if (ch === '\n') {
        masked += '\n';
      } else if (open && (i === 0 || i === match.length - 1)) {
        masked += ch;
      } else {
        masked += ' ';
      }
    }
    return masked;
  });
}

/**
 * Brace depth at the start of every offset in (masked) source
 */
export function braceDepths(masked: string): Int32Array {
  const depths = new Int32Array(masked.length + 1);
  let depth = 0;
  for (let i = 0; i < masked.length; i++) {
    depths[i] = depth;
    if (masked[i] === '{') depth++;
    else if (masked[i] === '}') depth = Math.max(0, depth - 1);
  }
  depths[masked.length] = depth;
  return depths;
}

/**
 * Offset of the brace closing the block opened at `openIndex`,
 * or the end of the source when unbalanced
 */
export function findBlockEnd(masked: string, openIndex: number): number {
  let depth = 0;
  for (let i = openIndex; i < masked.length; i++) {
    if (masked[i] === '{') depth++;
    else if (masked[i] === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return masked.length;
}

/**
 * Names called inside `body` that the file knows about (its own symbols and
 * imported names). Lexical only: `obj.save()` and `save()` both yield "save".
 */
export function findCalls(body: string, knownNames: Set<string>, self: string): string[] {
  const calls: string[] = [];
  const seen = new Set<string>();
  const callPattern = /\b([A-Za-z_$][\w$]*)\s*\(/g;

  let match: RegExpExecArray | null;
  while ((match = callPattern.exec(body)) !== null) {
    const name = match[1];
    if (name === self || seen.has(name) || !knownNames.has(name)) continue;
    seen.add(name);
    calls.push(name);
  }

  return calls;
}

export function toSymbol(signature: string, calls: string[]): SymbolRecord {
  if (calls.length === 0) {
    return { kind: 'signature', signature };
  }
  return { kind: 'call-graph', signature, calls };
}

/**
 * Collapse whitespace runs in a signature spanning several lines
 */
export function compactSignature(text: string): string {
  return text.replace(/\s+/g, ' ').replace(/\(\s+/g, '(').replace(/\s+\)/g, ')').trim();
}
