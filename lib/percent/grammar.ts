/**
 * percent/grammar.ts
 * Marker-line grammar shared by the encoder and the decoder.
 *
 * With the defaults (python, `%%`, `[markdown]`):
 *
 *   # %%              opens a code cell (anything after the marker is ignored)
 *   # %% [markdown]   opens a markdown cell (qualifier anywhere on the line)
 *   # some text       markdown content line
 *   #                 blank markdown content line
 *
 * Markers are recognized at column 0 only. Markdown text that itself starts
 * with the marker is not escaped, so it reads back as a cell boundary.
 */

import { z } from "zod";
import {
  getLanguageByIdOrAlias,
  lineCommentPrefix,
} from "../universal/content/code.ts";
import { isBlank, trimLeading } from "../universal/whitespace.ts";
import type { IssueHandler } from "./issues.ts";

export const percentOptionsSchema = z.object({
  /** Language id or alias; supplies the line-comment prefix. */
  language: z.string().min(1).default("python"),
  markerToken: z.string().regex(/^\S+$/, "must be non-empty without whitespace")
    .default("%%"),
  markdownQualifier: z.string().min(1).default("[markdown]"),
  /** Label attached to emitted issues. */
  filename: z.string().min(1).optional(),
});

export type PercentOptions =
  & z.input<typeof percentOptionsSchema>
  & { readonly issueHandler?: IssueHandler };

export type MarkerKind = "code" | "markdown";

export interface PercentGrammar {
  readonly languageId: string;
  readonly commentPrefix: string;
  /** Comment prefix + space + marker token, e.g. `# %%`. */
  readonly marker: string;
  readonly markdownQualifier: string;
  readonly codeMarkerLine: string;
  readonly markdownMarkerLine: string;
}

export interface ResolvedPercentOptions {
  readonly grammar: PercentGrammar;
  readonly filename: string;
  readonly issueHandler: IssueHandler;
}

export function resolvePercentOptions(
  options: PercentOptions,
  defaultFilename: string,
): ResolvedPercentOptions {
  const { issueHandler, ...rest } = options;
  const parsed = percentOptionsSchema.parse(rest);
  const language = getLanguageByIdOrAlias(parsed.language);
  if (!language) {
    throw new Error(`Unknown language "${parsed.language}"`);
  }
  const commentPrefix = lineCommentPrefix(language);
  const marker = `${commentPrefix} ${parsed.markerToken}`;
  return {
    grammar: {
      languageId: language.id,
      commentPrefix,
      marker,
      markdownQualifier: parsed.markdownQualifier,
      codeMarkerLine: marker,
      markdownMarkerLine: `${marker} ${parsed.markdownQualifier}`,
    },
    filename: parsed.filename ?? defaultFilename,
    issueHandler,
  };
}

/** Kind of cell a marker line opens, or undefined for content lines. */
export function markerKind(
  line: string,
  grammar: PercentGrammar,
): MarkerKind | undefined {
  if (!line.startsWith(grammar.marker)) return undefined;
  return line.includes(grammar.markdownQualifier) ? "markdown" : "code";
}

export function encodeMarkdownLine(
  line: string,
  grammar: PercentGrammar,
): string {
  return isBlank(line)
    ? grammar.commentPrefix
    : `${grammar.commentPrefix} ${line}`;
}

/**
 * Strip one comment-prefix layer: `# text` → `text`, `#text` or `#   text`
 * → `text`, `#` → ``. Undefined when the line carries no prefix at all.
 */
export function decodeMarkdownLine(
  line: string,
  grammar: PercentGrammar,
): string | undefined {
  const spaced = `${grammar.commentPrefix} `;
  if (line.startsWith(spaced)) return line.slice(spaced.length);
  if (line.startsWith(grammar.commentPrefix)) {
    return trimLeading(line.slice(grammar.commentPrefix.length));
  }
  return undefined;
}
