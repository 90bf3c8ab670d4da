/**
 * projmap Call Graph Builder
 * Derives forward (calls) and reverse (called_by) edges across all functions
 * and class methods, and merges the reverse edges back into symbol records.
 *
 * Matching is by bare name. Two files defining `save` both receive the
 * callers of any `save()` call, so called_by can contain false positives when
 * symbol names repeat across files.
 */

import { CallGraph, ClassRecord, FileRecord, SymbolRecord } from './types.js';

export interface CallGraphResult {
  /** New file records with called_by merged in; the input is not modified */
  files: Record<string, FileRecord>;
  /** Forward edges keyed `path:function` or `path:Class.method` */
  calls: CallGraph;
  /** Reverse index: bare callee name -> caller names (`fn` or `Class.method`) */
  calledBy: Map<string, string[]>;
}

function callsOf(symbol: SymbolRecord): string[] | undefined {
  return symbol.kind === 'call-graph' ? symbol.calls : undefined;
}

/**
 * Attach callers to a symbol, promoting signature-only records
 */
function withCallers(symbol: SymbolRecord, callers: string[]): SymbolRecord {
  if (symbol.kind === 'signature') {
    return { kind: 'call-graph', signature: symbol.signature, called_by: callers };
  }
  return { ...symbol, called_by: callers };
}

function addReverseEdge(calledBy: Map<string, string[]>, callee: string, caller: string): void {
  const callers = calledBy.get(callee);
  if (callers) {
    callers.push(caller);
  } else {
    calledBy.set(callee, [caller]);
  }
}

/**
 * Pass 1: forward edges and the reverse index
 */
function collectEdges(files: Record<string, FileRecord>): { calls: CallGraph; calledBy: Map<string, string[]> } {
  const calls: CallGraph = {};
  const calledBy = new Map<string, string[]>();

  for (const [filePath, record] of Object.entries(files)) {
    for (const [funcName, symbol] of Object.entries(record.functions ?? {})) {
      const callees = callsOf(symbol);
      if (!callees) continue;
      calls[`${filePath}:${funcName}`] = callees;
      for (const callee of callees) {
        addReverseEdge(calledBy, callee, funcName);
      }
    }

    for (const [className, classRecord] of Object.entries(record.classes ?? {})) {
      for (const [methodName, symbol] of Object.entries(classRecord.methods)) {
        const callees = callsOf(symbol);
        if (!callees) continue;
        const qualified = `${className}.${methodName}`;
        calls[`${filePath}:${qualified}`] = callees;
        for (const callee of callees) {
          addReverseEdge(calledBy, callee, qualified);
        }
      }
    }
  }

  return { calls, calledBy };
}

/**
 * Pass 2: merge reverse edges back into the records
 */
function mergeCallers(record: FileRecord, calledBy: Map<string, string[]>): FileRecord {
  const merged: FileRecord = { ...record };

  if (record.functions) {
    const functions: Record<string, SymbolRecord> = {};
    for (const [funcName, symbol] of Object.entries(record.functions)) {
      const callers = calledBy.get(funcName);
      functions[funcName] = callers ? withCallers(symbol, [...callers]) : symbol;
    }
    merged.functions = functions;
  }

  if (record.classes) {
    const classes: Record<string, ClassRecord> = {};
    for (const [className, classRecord] of Object.entries(record.classes)) {
      const methods: Record<string, SymbolRecord> = {};
      for (const [methodName, symbol] of Object.entries(classRecord.methods)) {
        const callers = [
          ...(calledBy.get(methodName) ?? []),
          ...(calledBy.get(`${className}.${methodName}`) ?? []),
        ];
        methods[methodName] = callers.length > 0
          ? withCallers(symbol, Array.from(new Set(callers)))
          : symbol;
      }
      classes[className] = { ...classRecord, methods };
    }
    merged.classes = classes;
  }

  return merged;
}

export function buildCallGraph(files: Record<string, FileRecord>): CallGraphResult {
  const { calls, calledBy } = collectEdges(files);

  const mergedFiles: Record<string, FileRecord> = {};
  for (const [filePath, record] of Object.entries(files)) {
    mergedFiles[filePath] = mergeCallers(record, calledBy);
  }

  return { files: mergedFiles, calls, calledBy };
}
