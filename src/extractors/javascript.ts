/**
 * JavaScript / TypeScript signature extractor
 * Regex-based: top-level functions, arrow functions bound to const/let/var,
 * classes with their methods, import sources and per-symbol calls
 */

import { ClassRecord, ExtractionResult, SymbolRecord } from '../types.js';
import { braceDepths, compactSignature, findBlockEnd, findCalls, maskSource, toSymbol } from './common.js';

const MASK_PATTERN = /\/\/[^\n]*|\/\*[\s\S]*?\*\/|'(?:\\.|[^'\\\n])*'|"(?:\\.|[^"\\\n])*"|`(?:\\.|[^`\\])*`/g;

const IMPORT_PATTERNS = [
  /^[ \t]*import\s+(?:type\s+)?(?:[\w$*{}\s,]+?\s+from\s+)?['"]([^'"]+)['"]/gm,
  /^[ \t]*export\s+(?:type\s+)?(?:\*|\{[^}]*\})(?:\s+as\s+[\w$]+)?\s+from\s+['"]([^'"]+)['"]/gm,
  /\brequire\(\s*['"]([^'"]+)['"]\s*\)/g,
];

const FUNCTION_PATTERN = /^[ \t]*(?:export\s+)?(?:default\s+)?(async\s+)?function\s*\*?\s*([\w$]+)\s*(?:<[^>(]*>)?\s*\(/gm;
const VARIABLE_FUNCTION_PATTERN = /^[ \t]*(?:export\s+)?(?:const|let|var)\s+([\w$]+)\s*(?::[^=\n]+)?=\s*(async\s+)?(function\b[^(]*)?(\(|[\w$]+\s*=>)/gm;
const CLASS_PATTERN = /^[ \t]*(?:export\s+)?(?:default\s+)?(?:abstract\s+)?class\s+([\w$]+)(?:\s*<[^>{]*>)?(?:\s+extends\s+([\w$.]+))?[^{]*\{/gm;
const METHOD_PATTERN = /^[ \t]*((?:(?:public|private|protected|static|async|readonly|override|get|set)\s+)*)\*?\s*([\w$]+)\s*(?:<[^>(]*>)?\s*\(/gm;

const NOT_METHODS = new Set(['if', 'for', 'while', 'switch', 'catch', 'return', 'function', 'with']);

interface Declaration {
  name: string;
  signature: string;
  body: string;
}

/**
 * Offset of the parenthesis closing the one opened at `openIndex`
 */
function findParenEnd(masked: string, openIndex: number): number {
  let depth = 0;
  for (let i = openIndex; i < masked.length; i++) {
    if (masked[i] === '(') depth++;
    else if (masked[i] === ')') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Parameter list plus optional return annotation, read from the unmasked source
 */
function readSignature(content: string, masked: string, parenOpen: number, prefix: string): { signature: string; parenClose: number } | null {
  const parenClose = findParenEnd(masked, parenOpen);
  if (parenClose === -1) return null;

  const params = content.slice(parenOpen, parenClose + 1);
  const returnMatch = /^(\s*:\s*)([^{=;]+?)\s*(?:\{|=>)/.exec(masked.slice(parenClose + 1));
  let returnType: string | undefined;
  if (returnMatch) {
    const start = parenClose + 1 + returnMatch[1].length;
    returnType = content.slice(start, start + returnMatch[2].length);
  }

  const signature = compactSignature(`${prefix}${params}${returnType ? `: ${returnType}` : ''}`);
  return { signature, parenClose };
}

/**
 * Body of an arrow function: a braced block, or the expression up to the end
 * of the statement
 */
function readArrowBody(masked: string, arrowEnd: number): string {
  let i = arrowEnd;
  while (i < masked.length && /\s/.test(masked[i])) i++;
  if (masked[i] === '{') {
    return masked.slice(i, findBlockEnd(masked, i) + 1);
  }
  const end = masked.slice(i).search(/;|\n\s*\n/);
  return end === -1 ? masked.slice(i) : masked.slice(i, i + end);
}

function collectImports(content: string): string[] {
  const found: Array<{ index: number; source: string }> = [];
  for (const pattern of IMPORT_PATTERNS) {
    pattern.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(content)) !== null) {
      found.push({ index: match.index, source: match[1] });
    }
  }

  found.sort((a, b) => a.index - b.index);
  const imports: string[] = [];
  for (const { source } of found) {
    if (!imports.includes(source)) imports.push(source);
  }
  return imports;
}

/**
 * Local names bound by import statements and require calls
 */
function collectImportedNames(content: string): Set<string> {
  const names = new Set<string>();
  const addList = (list: string) => {
    for (const part of list.split(',')) {
      const cleaned = part.replace(/^\s*type\s+/, '').trim();
      if (!cleaned) continue;
      const alias = cleaned.split(/\s+as\s+|\s*:\s*/).pop()?.trim();
      if (alias && /^[\w$]+$/.test(alias)) names.add(alias);
    }
  };

  const importPattern = /import\s+(?:type\s+)?(?:([\w$]+)\s*,?\s*)?(?:\{([^}]*)\}|\*\s+as\s+([\w$]+))?\s*from\s+['"]/g;
  let match: RegExpExecArray | null;
  while ((match = importPattern.exec(content)) !== null) {
    if (match[1]) names.add(match[1]);
    if (match[2]) addList(match[2]);
    if (match[3]) names.add(match[3]);
  }

  const requirePattern = /(?:const|let|var)\s+(?:\{([^}]*)\}|([\w$]+))\s*=\s*require\(/g;
  while ((match = requirePattern.exec(content)) !== null) {
    if (match[1]) addList(match[1]);
    if (match[2]) names.add(match[2]);
  }

  return names;
}

function collectFunctions(content: string, masked: string, depths: Int32Array): Declaration[] {
  const declarations: Declaration[] = [];

  FUNCTION_PATTERN.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = FUNCTION_PATTERN.exec(masked)) !== null) {
    if (depths[match.index] !== 0) continue;
    const parenOpen = match.index + match[0].length - 1;
    const read = readSignature(content, masked, parenOpen, match[1] ? 'async ' : '');
    if (!read) continue;

    const braceOpen = masked.indexOf('{', read.parenClose);
    const body = braceOpen === -1 ? '' : masked.slice(braceOpen, findBlockEnd(masked, braceOpen) + 1);
    declarations.push({ name: match[2], signature: read.signature, body });
  }

  VARIABLE_FUNCTION_PATTERN.lastIndex = 0;
  while ((match = VARIABLE_FUNCTION_PATTERN.exec(masked)) !== null) {
    if (depths[match.index] !== 0) continue;
    const name = match[1];
    const prefix = match[2] ? 'async ' : '';
    const isFunctionExpression = Boolean(match[3]);
    const tail = match[4];

    if (tail !== '(') {
      // Single bare parameter: x => ...
      const param = tail.replace(/\s*=>$/, '');
      const arrowEnd = match.index + match[0].length;
      declarations.push({ name, signature: `${prefix}(${param})`, body: readArrowBody(masked, arrowEnd) });
      continue;
    }

    const parenOpen = match.index + match[0].length - 1;
    const read = readSignature(content, masked, parenOpen, prefix);
    if (!read) continue;

    const after = masked.slice(read.parenClose + 1);
    if (isFunctionExpression) {
      const braceOpen = masked.indexOf('{', read.parenClose);
      const body = braceOpen === -1 ? '' : masked.slice(braceOpen, findBlockEnd(masked, braceOpen) + 1);
      declarations.push({ name, signature: read.signature, body });
      continue;
    }

    const arrow = after.match(/^\s*(?::\s*[^=;{]+?)?\s*=>/);
    if (!arrow) continue; // Parenthesised expression, not a function
    const arrowEnd = read.parenClose + 1 + arrow[0].length;
    declarations.push({ name, signature: read.signature, body: readArrowBody(masked, arrowEnd) });
  }

  return declarations;
}

interface ClassDeclaration {
  name: string;
  extends?: string;
  methods: Declaration[];
}

function collectClasses(content: string, masked: string, depths: Int32Array): ClassDeclaration[] {
  const classes: ClassDeclaration[] = [];

  CLASS_PATTERN.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = CLASS_PATTERN.exec(masked)) !== null) {
    if (depths[match.index] !== 0) continue;

    const braceOpen = match.index + match[0].length - 1;
    const braceClose = findBlockEnd(masked, braceOpen);
    const classBody = masked.slice(braceOpen + 1, braceClose);
    const methodDepth = depths[braceOpen] + 1;
    const methods: Declaration[] = [];

    METHOD_PATTERN.lastIndex = 0;
    let methodMatch: RegExpExecArray | null;
    while ((methodMatch = METHOD_PATTERN.exec(classBody)) !== null) {
      const name = methodMatch[2];
      const absolute = braceOpen + 1 + methodMatch.index;
      if (NOT_METHODS.has(name) || depths[absolute] !== methodDepth) continue;

      const parenOpen = braceOpen + 1 + methodMatch.index + methodMatch[0].length - 1;
      const prefix = /\basync\b/.test(methodMatch[1]) ? 'async ' : '';
      const read = readSignature(content, masked, parenOpen, prefix);
      if (!read) continue;

      // Must open a body; abstract and overload declarations have none
      const after = masked.slice(read.parenClose + 1);
      const opener = after.match(/^\s*(?::[^{;]+)?\{/);
      if (!opener) continue;

      const methodOpen = read.parenClose + opener[0].length;
      const body = masked.slice(methodOpen, findBlockEnd(masked, methodOpen) + 1);
      methods.push({ name, signature: read.signature, body });
    }

    classes.push({ name: match[1], extends: match[2], methods });
  }

  return classes;
}

export function extractJavaScriptSignatures(content: string): ExtractionResult {
  const masked = maskSource(content, MASK_PATTERN);
  const depths = braceDepths(masked);

  const functionDecls = collectFunctions(content, masked, depths);
  const classDecls = collectClasses(content, masked, depths);

  const knownNames = collectImportedNames(content);
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
    if (cls.extends) record.extends = cls.extends;
    classes[cls.name] = record;
  }

  return { functions, classes, imports: collectImports(content) };
}
