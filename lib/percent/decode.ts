import {
  newCodeCell,
  newMarkdownCell,
  type NotebookCell,
  type PercentDocument,
} from "../notebook/cells.ts";
import {
  isBlank,
  splitLines,
  trimTrailing,
} from "../universal/whitespace.ts";
import {
  decodeMarkdownLine,
  type MarkerKind,
  markerKind,
  type PercentGrammar,
  type PercentOptions,
  resolvePercentOptions,
} from "./grammar.ts";
import { emitIssue, type EmittedIssue, type IssueSink } from "./issues.ts";

export interface DecodedScript extends PercentDocument {
  readonly issues: readonly EmittedIssue[];
}

/** Scan accumulator: the open cell (if any) and its pending content. */
interface ScanState {
  readonly kind: MarkerKind | undefined;
  readonly firstLine: number; // 1-based line number of pending[0]
  readonly pending: string[];
}

interface FlushContext {
  readonly grammar: PercentGrammar;
  readonly filename: string;
  readonly cells: NotebookCell[];
  readonly sink: IssueSink;
}

function flush(state: ScanState, ctx: FlushContext): void {
  const { kind, pending, firstLine } = state;
  switch (kind) {
    case undefined:
      // nothing open yet: content before the first marker is dropped
      if (pending.length > 0) {
        emitIssue({
          kind: "pre-marker-content",
          message: `Ignored ${pending.length} line(s) before the first cell marker`,
          lineCount: pending.length,
          filename: ctx.filename,
          line: firstLine,
        }, "lint", ctx.sink);
      }
      return;

    case "markdown": {
      const text = pending.map((line, i) => {
        const decoded = decodeMarkdownLine(line, ctx.grammar);
        if (decoded !== undefined) return decoded;
        if (isBlank(line)) return line;
        emitIssue({
          kind: "malformed-markdown-line",
          message:
            `Markdown line without "${ctx.grammar.commentPrefix}" prefix kept as is`,
          filename: ctx.filename,
          line: firstLine + i,
        }, "lint", ctx.sink);
        return line;
      });
      ctx.cells.push(newMarkdownCell(trimTrailing(text.join("\n"))));
      return;
    }

    case "code":
      ctx.cells.push(newCodeCell(trimTrailing(pending.join("\n"))));
      return;
  }
}

/**
 * Percent script → notebook cells. Marker lines open cells; every other line
 * belongs to the most recently opened cell. Markdown content loses one
 * comment-prefix layer; all cells lose trailing whitespace.
 */
export function decodePercentScript(
  text: string,
  options: PercentOptions = {},
): DecodedScript {
  const { grammar, filename, issueHandler } = resolvePercentOptions(
    options,
    "notebook.py",
  );
  const ctx: FlushContext = {
    grammar,
    filename,
    cells: [],
    sink: { issues: [], handler: issueHandler },
  };

  const last = splitLines(text).reduce<ScanState>((state, line, index) => {
    const kind = markerKind(line, grammar);
    if (kind === undefined) {
      state.pending.push(line);
      return state;
    }
    flush(state, ctx);
    return { kind, firstLine: index + 2, pending: [] };
  }, { kind: undefined, firstLine: 1, pending: [] });
  flush(last, ctx);

  return { cells: ctx.cells, issues: ctx.sink.issues };
}
