import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  DiagnosticBuilder,
  LabelRole,
  Severity,
  severityTag,
  span,
} from '../../../src/diagnostics/diagnostics.js';
import { MalformedInputError } from '../../../src/diagnostics/errors.js';

describe('DiagnosticBuilder', () => {
  it('builds a frozen diagnostic with labels and fixes', () => {
    const diagnostic = DiagnosticBuilder.warning('sema-extra-rec')
      .withMessage('unnecessary `rec`')
      .withSpan(span('a.nix', 0, 3))
      .withLabel(span('a.nix', 4, 5), 'no self reference here')
      .withFix('remove `rec`', [{ span: span('a.nix', 0, 4), replacement: '' }])
      .build();

    assert.equal(diagnostic.severity, Severity.Warning);
    assert.equal(diagnostic.labels[0]?.role, LabelRole.Secondary);
    assert.equal(diagnostic.fixes[0]?.edits.length, 1);
    assert.ok(Object.isFrozen(diagnostic));
    assert.ok(Object.isFrozen(diagnostic.span));
    assert.ok(Object.isFrozen(diagnostic.labels));
    assert.ok(Object.isFrozen(diagnostic.fixes[0]?.edits[0]));
  });

  it('copies spans so later changes to the input do not leak in', () => {
    const input = { file: 'a.nix', start: 1, end: 2 };
    const diagnostic = DiagnosticBuilder.error('x').withMessage('m').withSpan(input).build();
    input.start = 0;
    assert.equal(diagnostic.span.start, 1);
  });

  it('requires id, message and span', () => {
    assert.throws(() => new DiagnosticBuilder().withMessage('m').withSpan(span('a', 0, 0)).build(), /id is required/);
    assert.throws(() => DiagnosticBuilder.error('x').withSpan(span('a', 0, 0)).build(), /message is required/);
    assert.throws(() => DiagnosticBuilder.error('x').withMessage('m').build(), /span is required/);
  });

  it('rejects labels that point into another file', () => {
    assert.throws(
      () =>
        DiagnosticBuilder.error('x')
          .withMessage('m')
          .withSpan(span('a.nix', 0, 1))
          .withLabel(span('b.nix', 0, 1), 'elsewhere')
          .build(),
      (error: unknown) =>
        error instanceof MalformedInputError &&
        error.file === 'a.nix' &&
        error.details[0] === 'labels[0] refers to b.nix, expected a.nix'
    );
  });

  it('rejects reversed spans', () => {
    assert.throws(
      () => DiagnosticBuilder.note('x').withMessage('m').withSpan(span('a.nix', 3, 1)).build(),
      (error: unknown) => error instanceof MalformedInputError && error.details[0] === 'span starts at 3 after its end 1'
    );
  });

  it('maps severities to header tags', () => {
    assert.equal(severityTag(Severity.Error), 'Error');
    assert.equal(severityTag(Severity.Warning), 'Warning');
    assert.equal(severityTag(Severity.Note), 'Note');
  });
});
