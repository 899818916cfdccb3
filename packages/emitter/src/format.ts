/**
 * Syntax check and canonical printing of generated sources
 */

import ts from "typescript";
import { fail, ok, type Diagnostic, type Result } from "@protogate/frontend";

const describe = (diagnostic: ts.Diagnostic): string => {
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n");
  if (diagnostic.file && diagnostic.start !== undefined) {
    const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(
      diagnostic.start
    );
    return `${diagnostic.file.fileName}:${line + 1}:${character + 1}: ${message}`;
  }
  return message;
};

/**
 * Reject source with syntax errors, then reprint it with the compiler's
 * printer so output does not depend on template whitespace. A rejection
 * carries the compiler errors followed by the source verbatim.
 */
export const formatSource = (
  fileName: string,
  source: string
): Result<string, Diagnostic> => {
  const transpiled = ts.transpileModule(source, {
    fileName,
    reportDiagnostics: true,
    compilerOptions: {
      module: ts.ModuleKind.ESNext,
      target: ts.ScriptTarget.ES2022,
    },
  });
  const errors = (transpiled.diagnostics ?? []).filter(
    (d) => d.category === ts.DiagnosticCategory.Error
  );
  if (errors.length > 0) {
    return fail(
      "PGW2002",
      `${fileName}: generated source does not parse`,
      `${errors.map(describe).join("\n")}\n${source}`
    );
  }

  const sourceFile = ts.createSourceFile(
    fileName,
    source,
    ts.ScriptTarget.ES2022,
    true,
    ts.ScriptKind.TS
  );
  const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });
  return ok(printer.printFile(sourceFile));
};
