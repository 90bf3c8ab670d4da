/**
 * Tests for call graph construction
 */

import { describe, it, expect } from 'vitest';
import { buildCallGraph } from '../call-graph.js';
import { calling, createMockFile, sig } from './helpers.js';
import type { FileRecord, SymbolRecord } from '../types.js';

function fixture(): Record<string, FileRecord> {
  return {
    'a.py': createMockFile({
      functions: {
        main: calling('()', ['helper', 'save']),
        helper: sig('(x)'),
      },
    }),
    'b.py': createMockFile({
      functions: { save: sig('()') },
      classes: {
        Store: {
          methods: {
            save: calling('(self)', ['validate']),
            validate: sig('(self)'),
            flush: calling('(self)', ['save', 'validate', 'Store.validate']),
          },
        },
      },
    }),
    'c.py': createMockFile({ functions: { run: calling('()', ['helper']) } }),
    'd.py': createMockFile({ functions: { run: calling('()', ['helper']) } }),
  };
}

function calledBy(symbol: SymbolRecord | undefined): string[] | undefined {
  return symbol?.kind === 'call-graph' ? symbol.called_by : undefined;
}

describe('buildCallGraph', () => {
  it('collects forward edges keyed by path and qualified name', () => {
    const { calls } = buildCallGraph(fixture());

    expect(calls).toEqual({
      'a.py:main': ['helper', 'save'],
      'b.py:Store.save': ['validate'],
      'b.py:Store.flush': ['save', 'validate', 'Store.validate'],
      'c.py:run': ['helper'],
      'd.py:run': ['helper'],
    });
  });

  it('promotes signature-only functions that gain callers, keeping duplicates', () => {
    const { files } = buildCallGraph(fixture());

    expect(files['a.py'].functions?.helper).toEqual({
      kind: 'call-graph',
      signature: '(x)',
      called_by: ['main', 'run', 'run'],
    });
  });

  it('matches callers by bare name across files', () => {
    const { files } = buildCallGraph(fixture());

    expect(calledBy(files['b.py'].functions?.save)).toEqual(['main', 'Store.flush']);
  });

  it('unions bare and qualified callers for methods without duplicates', () => {
    const { files } = buildCallGraph(fixture());
    const methods = files['b.py'].classes?.Store.methods;

    expect(methods?.validate).toEqual({
      kind: 'call-graph',
      signature: '(self)',
      called_by: ['Store.save', 'Store.flush'],
    });
    expect(methods?.save).toEqual({
      kind: 'call-graph',
      signature: '(self)',
      calls: ['validate'],
      called_by: ['main', 'Store.flush'],
    });
  });

  it('leaves symbols without callers untouched', () => {
    const { files } = buildCallGraph(fixture());

    expect(files['a.py'].functions?.main).toEqual(calling('()', ['helper', 'save']));
    expect(files['b.py'].classes?.Store.methods.flush).toEqual(
      calling('(self)', ['save', 'validate', 'Store.validate'])
    );
    expect(calledBy(files['c.py'].functions?.run)).toBeUndefined();
  });

  it('does not modify the input records', () => {
    const input = fixture();
    buildCallGraph(input);

    expect(input['a.py'].functions?.helper).toEqual(sig('(x)'));
    expect(input['b.py'].classes?.Store.methods.validate).toEqual(sig('(self)'));
  });

  it('records every forward edge on the callee side', () => {
    const { files, calls } = buildCallGraph(fixture());

    for (const [key, callees] of Object.entries(calls)) {
      const caller = key.slice(key.indexOf(':') + 1);
      for (const callee of callees) {
        const [className, methodName] = callee.includes('.') ? callee.split('.') : [undefined, callee];
        const targets: SymbolRecord[] = [];
        for (const record of Object.values(files)) {
          if (!className && record.functions?.[methodName]) {
            targets.push(record.functions[methodName]);
          }
          for (const [name, cls] of Object.entries(record.classes ?? {})) {
            if ((className === undefined || className === name) && cls.methods[methodName]) {
              targets.push(cls.methods[methodName]);
            }
          }
        }

        expect(targets.length).toBeGreaterThan(0);
        for (const target of targets) {
          expect(calledBy(target)).toContain(caller);
        }
      }
    }
  });
});
