import type { PercentDocument } from "../notebook/cells.ts";
import { splitLines, trimTrailing } from "../universal/whitespace.ts";
import {
  encodeMarkdownLine,
  type PercentOptions,
  resolvePercentOptions,
} from "./grammar.ts";
import { emitIssue, type EmittedIssue, type IssueSink } from "./issues.ts";

export interface EncodedScript {
  readonly text: string;
  readonly issues: readonly EmittedIssue[];
}

/**
 * Notebook cells → percent script. Each code or markdown cell becomes a
 * marker line, its content and one blank separator; other cell kinds are
 * skipped with an `unsupported-cell-kind` warning. The result ends with
 * exactly one newline.
 */
export function encodePercentScript(
  doc: PercentDocument,
  options: PercentOptions = {},
): EncodedScript {
  const { grammar, filename, issueHandler } = resolvePercentOptions(
    options,
    "notebook.ipynb",
  );
  const sink: IssueSink = { issues: [], handler: issueHandler };
  const lines: string[] = [];

  doc.cells.forEach((cell, cellIndex) => {
    switch (cell.kind) {
      case "markdown":
        lines.push(grammar.markdownMarkerLine);
        for (const line of splitLines(cell.source)) {
          lines.push(encodeMarkdownLine(line, grammar));
        }
        lines.push("");
        break;

      case "code":
        lines.push(grammar.codeMarkerLine);
        for (const line of splitLines(cell.source)) lines.push(line);
        lines.push("");
        break;

      case "other":
        emitIssue({
          kind: "unsupported-cell-kind",
          message: `Skipping unsupported cell type: '${cell.cellType}'`,
          cellType: cell.cellType,
          filename,
          cellIndex,
        }, "warning", sink);
        break;
    }
  });

  return { text: `${trimTrailing(lines.join("\n"))}\n`, issues: sink.issues };
}
