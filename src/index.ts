export type { ByteSpan, Position } from './types.js';
export { SourceIndex } from './source/source-index.js';
export {
  DiagnosticBuilder,
  LabelRole,
  Severity,
  severityTag,
  span,
  type Diagnostic,
  type Edit,
  type Fix,
  type Label,
} from './diagnostics/diagnostics.js';
export {
  ConflictingEditsError,
  MalformedInputError,
  NixfReportError,
  OutOfBoundsError,
  isNixfReportError,
  type ConflictingEdit,
  type NixfReportErrorKind,
} from './diagnostics/errors.js';
export { filterDiagnostics, isVariableLookupDiagnostic, selectDiagnostics, type SelectOptions } from './diagnostics/filter.js';
export { formatMessage, mapSeverity, parseAnalyzerOutput, type RawDiagnostic } from './diagnostics/payload.js';
export { layoutLine, LayoutCache, type LineLayout } from './render/layout.js';
export { DiagnosticRenderer, Glyphs, renderDiagnostic, type RenderOptions } from './render/renderer.js';
export { applyEdits, applyFixes, checkDisjoint, selectFixes, sortEdits } from './fix/apply.js';
export { processFile, type FileInput, type FileOutcome, type ProcessOptions } from './pipeline/process-file.js';
