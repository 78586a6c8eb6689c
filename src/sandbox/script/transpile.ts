import ts from 'typescript';
import { GuestSyntaxError } from '../../execution/ErrorHandling.js';

/**
 * Strip types from TypeScript guest source. Only syntactic diagnostics are
 * reported; type errors never fail an execution.
 */
export function transpileTypeScript(source: string): string {
  const output = ts.transpileModule(source, {
    fileName: 'guest.ts',
    reportDiagnostics: true,
    compilerOptions: {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.ESNext,
    },
  });

  // Diagnostics without a file concern compiler options, not the guest
  const diagnostic = (output.diagnostics ?? []).find(
    (entry) => entry.category === ts.DiagnosticCategory.Error && entry.file !== undefined,
  );
  if (diagnostic?.file) {
    const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n');
    const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start ?? 0);
    throw new GuestSyntaxError(message, { line: line + 1, column: character + 1 });
  }

  return output.outputText;
}
