import type { Diagnostic } from './diagnostics.js';

/** Ids the analyzer only produces when variable lookup is enabled. */
const VARIABLE_LOOKUP_IDS: ReadonlySet<string> = new Set([
  'sema-undefined-variable',
  'sema-extra-with',
  'sema-escaping-with',
  'sema-extra-rec',
]);

const VARIABLE_LOOKUP_PREFIX = 'sema-unused-def';

export interface SelectOptions {
  readonly ignore: ReadonlySet<string>;
  readonly variableLookup: boolean;
}

/**
 * Drops every diagnostic whose id is in `ignore`, keeping the relative order of
 * the rest. The input array is not modified.
 */
export function filterDiagnostics(
  diagnostics: readonly Diagnostic[],
  ignore: ReadonlySet<string>
): Diagnostic[] {
  if (ignore.size === 0) return [...diagnostics];
  return diagnostics.filter(diagnostic => !ignore.has(diagnostic.id));
}

export function isVariableLookupDiagnostic(id: string): boolean {
  return VARIABLE_LOOKUP_IDS.has(id) || id.startsWith(VARIABLE_LOOKUP_PREFIX);
}

export function selectDiagnostics(
  diagnostics: readonly Diagnostic[],
  options: SelectOptions
): Diagnostic[] {
  const kept = filterDiagnostics(diagnostics, options.ignore);
  return options.variableLookup ? kept : kept.filter(d => !isVariableLookupDiagnostic(d.id));
}
