import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { processFile, type ProcessOptions } from '../../../src/pipeline/process-file.js';
import { ConflictingEditsError } from '../../../src/diagnostics/errors.js';

const SOURCE = 'rec { a = 1; a = 1; }';

function range(start: number, end: number) {
  return { lCur: { offset: start }, rCur: { offset: end } };
}

const DUPLICATED = {
  sname: 'duplicated-attrname',
  severity: 1,
  message: 'duplicated attrname `{}`',
  args: ['a'],
  range: range(13, 14),
  notes: [{ message: 'previously declared here', range: range(6, 7) }],
};

const EXTRA_REC = {
  sname: 'sema-extra-rec',
  severity: 2,
  message: 'unnecessary `rec`',
  range: range(0, 3),
  fixes: [{ message: 'remove `rec` keyword', edits: [{ range: range(0, 4), newText: '' }] }],
};

const DEFAULTS: ProcessOptions = { ignore: new Set(), variableLookup: true, fix: false };

describe('processFile', () => {
  it('renders every kept diagnostic into one report', () => {
    const outcome = processFile(
      { file: 'a.nix', source: SOURCE, payload: JSON.stringify([DUPLICATED, EXTRA_REC]) },
      DEFAULTS
    );

    assert.equal(outcome.diagnostics.length, 2);
    assert.deepEqual(outcome.warnings, []);
    assert.equal(outcome.fixed, undefined);
    assert.deepEqual(outcome.report.split('\n'), [
      '[duplicated-attrname] Error: duplicated attrname `a`',
      '   ╭─[a.nix:1:14]',
      '   │',
      ' 1 │ rec { a = 1; a = 1; }',
      '   │       - previously declared here',
      '   │              ^ duplicated attrname `a`',
      '───╯',
      '',
      '[sema-extra-rec] Warning: unnecessary `rec`',
      '   ╭─[a.nix:1:1]',
      '   │',
      ' 1 │ rec { a = 1; a = 1; }',
      '   │ ^^^ unnecessary `rec`',
      '───╯',
      '',
    ]);
  });

  it('honours the ignore-set and the variable lookup switch', () => {
    const undefinedVar = { sname: 'sema-undefined-variable', severity: 1, message: 'undefined', range: range(6, 7) };
    const outcome = processFile(
      { file: 'a.nix', source: SOURCE, payload: JSON.stringify([DUPLICATED, undefinedVar, EXTRA_REC]) },
      { ...DEFAULTS, ignore: new Set(['duplicated-attrname']), variableLookup: false }
    );
    assert.deepEqual(
      outcome.diagnostics.map(d => d.id),
      ['sema-extra-rec']
    );
  });

  it('skips a diagnostic whose span is outside the buffer with a warning', () => {
    const broken = { ...EXTRA_REC, sname: 'broken', range: range(0, 500) };
    const outcome = processFile(
      { file: 'a.nix', source: SOURCE, payload: JSON.stringify([broken, EXTRA_REC]) },
      DEFAULTS
    );
    assert.equal(outcome.warnings.length, 1);
    assert.match(outcome.warnings[0] ?? '', /^skipped \[broken\] in a\.nix: Offset 500 is outside the buffer/);
    assert.match(outcome.report, /^\[sema-extra-rec\] Warning/);
  });

  it('reports malformed analyzer output without throwing', () => {
    const outcome = processFile({ file: 'a.nix', source: SOURCE, payload: 'not json' }, DEFAULTS);
    assert.equal(outcome.report, '');
    assert.deepEqual(outcome.diagnostics, []);
    assert.equal(outcome.malformed?.file, 'a.nix');
    assert.equal(outcome.warnings.length, 1);
  });

  it('produces the fixed buffer in fix mode', () => {
    const outcome = processFile(
      { file: 'a.nix', source: SOURCE, payload: JSON.stringify([DUPLICATED, EXTRA_REC]) },
      { ...DEFAULTS, fix: true }
    );
    assert.equal(outcome.fixed?.toString('utf8'), '{ a = 1; a = 1; }');
  });

  it('leaves the file alone when fixes conflict', () => {
    const overlapping = {
      ...EXTRA_REC,
      sname: 'other',
      fixes: [{ message: 'rename', edits: [{ range: range(2, 5), newText: 'x' }] }],
    };
    const outcome = processFile(
      { file: 'a.nix', source: SOURCE, payload: JSON.stringify([EXTRA_REC, overlapping]) },
      { ...DEFAULTS, fix: true }
    );
    assert.equal(outcome.fixed, undefined);
    assert.ok(outcome.fixError instanceof ConflictingEditsError);
    assert.equal(outcome.warnings.length, 1);
    assert.equal(outcome.diagnostics.length, 2);
  });

  it('does not fix anything without fix mode', () => {
    const outcome = processFile(
      { file: 'a.nix', source: SOURCE, payload: JSON.stringify([EXTRA_REC]) },
      DEFAULTS
    );
    assert.equal(outcome.fixed, undefined);
    assert.equal(outcome.fixError, undefined);
  });
});
