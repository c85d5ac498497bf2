import { describe, it, expect } from 'vitest';
import { applyEdits, EditSession, validateEditSpec } from '../src/tools/edit/edit-session.js';
import { EditEngineError, EditEngineErrorCode } from '../src/tools/edit/errors.js';
import { locate } from '../src/tools/edit/pattern-matcher.js';
import type { EditSpec } from '../src/tools/edit/types.js';

describe('applyEdits scenarios', () => {
  it('deletes a matched line', () => {
    const result = applyEdits('A\nB\nC\n', [{ kind: 'delete', startPattern: 'B\n' }]);
    expect(result.ok).toBe(true);
    expect(result.document).toBe('A\nC\n');
    expect(result.outcomes).toEqual([
      { index: 0, status: 'applied', kind: 'delete', span: { start: 2, end: 2 }, lines: { start: 2, end: 2 } },
    ]);
  });

  it('replaces verified content', () => {
    const result = applyEdits('x=1\n', [
      { kind: 'replace', startPattern: 'x=1', expectedContent: 'x=1', content: ['x=2'] },
    ]);
    expect(result.ok).toBe(true);
    expect(result.document).toBe('x=2\n');
  });

  it('inserts after an anchor', () => {
    const result = applyEdits('import os\n', [
      { kind: 'insert', afterPattern: 'import os\n', content: ['import sys'] },
    ]);
    expect(result.document).toBe('import os\nimport sys\n');
    expect(result.outcomes[0]).toMatchObject({ status: 'applied', lines: { start: 2, end: 2 } });
  });

  it('inserts before an anchor', () => {
    const result = applyEdits('def main():\n    pass\n', [
      { kind: 'insert', beforePattern: '^def main', content: ['import sys', ''] },
    ]);
    expect(result.document).toBe('import sys\n\ndef main():\n    pass\n');
  });

  it('reports an ambiguous start pattern and leaves the document unchanged', () => {
    const doc = 'value = 1\nvalue = 1\n';
    const result = applyEdits(doc, [{ kind: 'delete', startPattern: 'value = 1' }]);
    expect(result.ok).toBe(false);
    expect(result.document).toBe(doc);
    expect(result.failedIndex).toBe(0);
    expect(result.outcomes).toEqual([
      { index: 0, status: 'pattern_ambiguous', pattern: 'value = 1', role: 'start', count: 2 },
    ]);
  });

  it('deletes a block together with its closing marker', () => {
    const doc = 'keep\n// begin\nold 1\nold 2\n// end\nkeep too\n';
    const result = applyEdits(doc, [{ kind: 'delete', startPattern: '// begin\\n', endPattern: '// end\\n' }]);
    expect(result.document).toBe('keep\nkeep too\n');
  });

  it('replaces a block', () => {
    const doc = 'function f() {\n  return 1;\n}\n';
    const result = applyEdits(doc, [{
      kind: 'replace',
      startPattern: '^function f',
      endPattern: '^\\}\\n',
      expectedContent: 'function f() {\n  return 1;\n}\n',
      content: ['function f() {', '  return 2;', '}'],
    }]);
    expect(result.document).toBe('function f() {\n  return 2;\n}\n');
  });
});

describe('verification', () => {
  it('refuses a one-character mismatch without touching the document', () => {
    const doc = 'x=1\n';
    const result = applyEdits(doc, [
      { kind: 'replace', startPattern: 'x=1', expectedContent: 'x=2', content: ['x=3'] },
    ]);
    expect(result.document).toBe(doc);
    expect(result.outcomes).toEqual([
      { index: 0, status: 'verification_failed', span: { start: 0, end: 3 }, expected: 'x=2', actual: 'x=1' },
    ]);
  });

  it('checks insert anchors against expected content', () => {
    const result = applyEdits('import os\n', [
      { kind: 'insert', afterPattern: 'import \\w+', expectedContent: 'import re', content: ['import sys'] },
    ]);
    expect(result.outcomes[0]).toMatchObject({ status: 'verification_failed', actual: 'import os' });
  });
});

describe('ordering', () => {
  const first: EditSpec = { kind: 'replace', startPattern: 'alpha', content: ['beta'] };
  const second: EditSpec = { kind: 'replace', startPattern: 'beta', content: ['gamma'] };

  it('resolves each edit against the text left by the previous one', () => {
    const result = applyEdits('alpha\n', [first, second]);
    expect(result.ok).toBe(true);
    expect(result.document).toBe('gamma\n');
  });

  it('fails the first edit when the order is reversed', () => {
    const result = applyEdits('alpha\n', [second, first]);
    expect(result.ok).toBe(false);
    expect(result.outcomes).toEqual([
      { index: 0, status: 'pattern_not_found', pattern: 'beta', role: 'start' },
    ]);
  });

  it('re-locates patterns after earlier edits shift the text', () => {
    const result = applyEdits('a\nb\nc\n', [
      { kind: 'insert', afterPattern: '^a\\n', content: ['inserted 1', 'inserted 2'] },
      { kind: 'replace', startPattern: '^c$', expectedContent: 'c', content: ['C'] },
    ]);
    expect(result.document).toBe('a\ninserted 1\ninserted 2\nb\nC\n');
    expect(result.outcomes[1]).toMatchObject({ status: 'applied', lines: { start: 5, end: 5 } });
  });
});

describe('partial application', () => {
  it('keeps earlier edits and stops at the first failure', () => {
    const result = applyEdits('one\ntwo\nthree\n', [
      { kind: 'replace', startPattern: 'one', content: ['ONE'] },
      { kind: 'delete', startPattern: 'missing' },
      { kind: 'replace', startPattern: 'three', content: ['THREE'] },
    ]);
    expect(result.ok).toBe(false);
    expect(result.failedIndex).toBe(1);
    expect(result.document).toBe('ONE\ntwo\nthree\n');
    expect(result.outcomes.map(o => o.status)).toEqual(['applied', 'pattern_not_found']);
  });
});

describe('properties', () => {
  it('no longer finds a uniquely matched span after deleting it', () => {
    const doc = 'head\n<target>\ntail\n';
    expect(locate(doc, '<target>\\n').status).toBe('found');
    const result = applyEdits(doc, [{ kind: 'delete', startPattern: '<target>\\n' }]);
    expect(locate(result.document, '<target>\\n')).toEqual({ status: 'not_found', pattern: '<target>\\n', role: 'start' });
  });

  it('leaves the document byte-identical for a no-op replace', () => {
    const doc = 'a\r\nb\r\nc\r\n';
    const result = applyEdits(doc, [{ kind: 'replace', startPattern: 'b\\r\\n', content: ['b\r\n'] }]);
    expect(result.document).toBe(doc);
  });

  it('leaves a mixed line-ending document byte-identical for a no-op replace', () => {
    const doc = 'a\nb\r\nc\n';
    const result = applyEdits(doc, [{ kind: 'replace', startPattern: 'b\\r\\n', content: ['b\r\n'] }]);
    expect(result.document).toBe(doc);
  });
});

describe('invalid specs', () => {
  it.each<[EditSpec, string]>([
    [{ kind: 'delete' }, 'delete requires startPattern'],
    [{ kind: 'replace', startPattern: 'a' }, 'replace requires content'],
    [{ kind: 'insert', content: ['x'] }, 'insert requires afterPattern or beforePattern'],
    [{ kind: 'insert', afterPattern: 'a' }, 'insert requires at least one content line'],
    [{ kind: 'insert', afterPattern: 'a', content: [] }, 'insert requires at least one content line'],
    [{ kind: 'insert', afterPattern: 'a', beforePattern: 'b', content: ['x'] }, 'insert takes only one of afterPattern and beforePattern'],
    [{ kind: 'insert', startPattern: 'a', content: ['x'] }, 'insert takes afterPattern or beforePattern, not startPattern/endPattern'],
    [{ kind: 'delete', startPattern: 'a', content: ['x'] }, 'delete does not take content'],
    [{ kind: 'replace', startPattern: 'a', afterPattern: 'b', content: [] }, 'replace does not take afterPattern or beforePattern'],
    [{ kind: 'delete', startPattern: '' }, 'startPattern must not be empty'],
  ])('rejects %j', (spec, reason) => {
    expect(validateEditSpec(spec)).toBe(reason);
    expect(applyEdits('a\n', [spec]).outcomes).toEqual([{ index: 0, status: 'invalid_spec', reason }]);
  });

  it('reports an uncompilable pattern as an invalid spec', () => {
    const result = applyEdits('a\n', [{ kind: 'delete', startPattern: '(' }]);
    expect(result.outcomes[0]).toMatchObject({ index: 0, status: 'invalid_spec' });
  });

  it('accepts well-formed specs', () => {
    expect(validateEditSpec({ kind: 'delete', startPattern: 'a', endPattern: 'b' })).toBeNull();
    expect(validateEditSpec({ kind: 'insert', beforePattern: 'a', content: ['x'] })).toBeNull();
  });
});

describe('EditSession', () => {
  it('returns the unchanged document for an empty edit list', () => {
    expect(new EditSession('text', []).run()).toEqual({ document: 'text', outcomes: [], ok: true });
  });

  it('runs only once', () => {
    const session = new EditSession('a\n', []);
    session.run();
    expect(() => session.run()).toThrow(EditEngineError);
  });

  it('treats a missing document as a programming error', () => {
    try {
      new EditSession(JSON.parse('null'), []);
      expect.unreachable('constructor should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(EditEngineError);
      if (error instanceof EditEngineError) {
        expect(error.code).toBe(EditEngineErrorCode.INVALID_DOCUMENT);
        expect(error.context).toEqual({ received: 'null' });
      }
    }
  });
});
