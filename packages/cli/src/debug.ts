import type { GenerationDiagnostic, ResolvedOptions } from '@idlgen/core';
import type { TestDataContext } from '@idlgen/runtime';

/** One diagnostic as a single `CODE key=value ... {details}` line */
export function formatDiagnostic(diagnostic: GenerationDiagnostic): string {
  const parts: string[] = [diagnostic.code];
  if (diagnostic.schema !== undefined) parts.push(`schema=${diagnostic.schema}`);
  if (diagnostic.name !== undefined) parts.push(`name=${diagnostic.name}`);
  if (diagnostic.stream !== undefined) parts.push(`stream=${diagnostic.stream}`);
  if (diagnostic.details !== undefined) parts.push(JSON.stringify(diagnostic.details));
  return parts.join(' ');
}

/**
 * Print generation diagnostics to stderr.
 * Intended to be used behind the --verbose flag.
 */
export function printDiagnostics(diagnostics: readonly GenerationDiagnostic[]): void {
  if (diagnostics.length === 0) {
    process.stderr.write('[idlgen] diagnostics: none\n');
    return;
  }
  for (const diagnostic of diagnostics) {
    process.stderr.write(`[idlgen] ${formatDiagnostic(diagnostic)}\n`);
  }
}

/** Behind --debug-config: the options generation actually ran with */
export function printEffectiveConfig(
  options: ResolvedOptions,
  context?: TestDataContext
): void {
  const effective = context === undefined ? options : { ...options, context };
  process.stderr.write(
    `[idlgen] effective config: ${JSON.stringify(effective, null, 2)}\n`
  );
}
