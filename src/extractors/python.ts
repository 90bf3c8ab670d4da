/**
 * Python signature extractor
 * Regex + indentation based: top-level functions, top-level classes with
 * their methods, import statements and per-symbol calls
 */

import { ClassRecord, ExtractionResult, SymbolRecord } from '../types.js';
import { compactSignature, findCalls, maskSource, toSymbol } from './common.js';

const MASK_PATTERN = /"""[\s\S]*?"""|'''[\s\S]*?'''|#[^\n]*|'(?:\\.|[^'\\\n])*'|"(?:\\.|[^"\\\n])*"/g;

const CLASS_LINE = /^class\s+(\w+)\s*(?:\(([^)]*)\))?\s*:/;
const DEF_LINE = /^(\s*)(async\s+)?def\s+(\w+)\s*\(/;

interface Declaration {
  name: string;
  signature: string;
  body: string;
}

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

/**
 * Turn a dotted relative module into a path-style import:
 * `.utils` -> `./utils`, `..core.models` -> `../core/models`, `.` -> `.`
 */
export function pythonModuleToImport(module: string): string {
  const dots = module.match(/^\.*/)?.[0].length ?? 0;
  if (dots === 0) return module;

  const rest = module.slice(dots).split('.').filter(Boolean).join('/');
  if (dots === 1) return rest ? `./${rest}` : '.';
  return '../'.repeat(dots - 1) + rest;
}

function collectImports(masked: string): { imports: string[]; names: Set<string> } {
  const imports: string[] = [];
  const names = new Set<string>();
  const add = (source: string) => {
    if (!imports.includes(source)) imports.push(source);
  };

  const pattern = /^[ \t]*(?:from\s+(\.*[\w.]*)\s+import\s+(\([^)]*\)|[^\n]+)|import\s+([^\n]+))/gm;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(masked)) !== null) {
    if (match[1] !== undefined) {
      add(pythonModuleToImport(match[1]));
      for (const part of match[2].replace(/[()]/g, '').split(',')) {
        const alias = part.trim().split(/\s+as\s+/).pop()?.trim();
        if (alias && alias !== '*') names.add(alias);
      }
    } else if (match[3] !== undefined) {
      for (const part of match[3].split(',')) {
        const [module, alias] = part.trim().split(/\s+as\s+/);
        if (!module) continue;
        add(module.trim());
        names.add((alias ?? module).trim().split('.')[0]);
      }
    }
  }

  return { imports, names };
}

/**
 * Read a `def` starting at line `start`: signature text and the index of the
 * line holding the closing colon
 */
function readDef(lines: string[], maskedLines: string[], start: number, isAsync: boolean): { signature: string; endLine: number } {
  const maskedHead = maskedLines[start];
  const openCol = maskedHead.indexOf('(');

  let depth = 0;
  let params = '';
  let rest = '';
  let line = start;
  let col = openCol;
  let closed = false;

  for (; line < lines.length; line++, col = 0) {
    const masked = maskedLines[line];
    for (; col < masked.length; col++) {
      const ch = masked[col];
      if (!closed) {
        params += lines[line][col] ?? ch;
        if (ch === '(') depth++;
        else if (ch === ')') {
          depth--;
          if (depth === 0) closed = true;
        }
      } else if (ch === ':') {
        const returns = rest.trim();
        const signature = compactSignature(`${isAsync ? 'async ' : ''}${params}${returns ? ` ${returns}` : ''}`);
        return { signature, endLine: line };
      } else {
        rest += lines[line][col] ?? ch;
      }
    }
    if (!closed) params += ' ';
  }

  return { signature: compactSignature(params), endLine: lines.length - 1 };
}

/**
 * Lines indented deeper than `indent`, starting after `endLine`
 */
function readBody(maskedLines: string[], endLine: number, indent: number): { body: string; lastLine: number } {
  const body: string[] = [];
  let line = endLine + 1;
  for (; line < maskedLines.length; line++) {
    const text = maskedLines[line];
    if (text.trim() === '') {
      body.push(text);
      continue;
    }
    if (indentOf(text) <= indent) break;
    body.push(text);
  }
  // Code on the def line itself: def f(): return g()
  const inline = maskedLines[endLine].slice(maskedLines[endLine].lastIndexOf(':') + 1);
  return { body: [inline, ...body].join('\n'), lastLine: line - 1 };
}

export function extractPythonSignatures(content: string): ExtractionResult {
  const lines = content.split('\n');
  const maskedLines = maskSource(content, MASK_PATTERN).split('\n');
  const { imports, names } = collectImports(maskedLines.join('\n'));

  const functionDecls: Declaration[] = [];
  const classDecls: Array<{ name: string; bases?: string; methods: Declaration[] }> = [];
  let currentClass: { name: string; bases?: string; methods: Declaration[] } | null = null;
  let methodIndent: number | null = null;

  for (let i = 0; i < maskedLines.length; i++) {
    const text = maskedLines[i];
    if (text.trim() === '') continue;
    const indent = indentOf(text);

    if (indent === 0) {
      currentClass = null;
      methodIndent = null;
      const classMatch = text.match(CLASS_LINE);
      if (classMatch) {
        currentClass = { name: classMatch[1], bases: classMatch[2]?.trim() || undefined, methods: [] };
        classDecls.push(currentClass);
        continue;
      }
    }

    const defMatch = text.match(DEF_LINE);
    if (!defMatch) continue;

    const isTopLevel = indent === 0;
    const isMethod = currentClass !== null && indent > 0 && (methodIndent === null || indent === methodIndent);
    if (!isTopLevel && !isMethod) continue;

    const { signature, endLine } = readDef(lines, maskedLines, i, Boolean(defMatch[2]));
    const { body, lastLine } = readBody(maskedLines, endLine, indent);
    const declaration = { name: defMatch[3], signature, body };

    if (isTopLevel) {
      functionDecls.push(declaration);
    } else if (currentClass) {
      methodIndent = indent;
      currentClass.methods.push(declaration);
    }
    i = lastLine;
  }

  const knownNames = new Set(names);
  for (const fn of functionDecls) knownNames.add(fn.name);
  for (const cls of classDecls) {
    knownNames.add(cls.name);
    for (const method of cls.methods) knownNames.add(method.name);
  }

  const functions: Record<string, SymbolRecord> = {};
  for (const fn of functionDecls) {
    functions[fn.name] = toSymbol(fn.signature, findCalls(fn.body, knownNames, fn.name));
  }

  const classes: Record<string, ClassRecord> = {};
  for (const cls of classDecls) {
    const record: ClassRecord = { methods: {} };
    for (const method of cls.methods) {
      record.methods[method.name] = toSymbol(method.signature, findCalls(method.body, knownNames, method.name));
    }
    if (cls.bases) record.extends = cls.bases;
    classes[cls.name] = record;
  }

  return { functions, classes, imports };
}
