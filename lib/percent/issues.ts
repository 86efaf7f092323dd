/* =============================== Issues ================================== */

/** Final disposition recorded on each issue (can be overridden by handler). */
export type IssueDisposition = "error" | "warning" | "lint";

/** Common location context for issues. */
export interface IssueLocation {
  readonly filename: string;
  readonly line?: number; // 1-based, script side
  readonly cellIndex?: number; // 0-based, notebook side
}

/** Discriminated union of all issues the codec can emit. */
export type Issue =
  | ({
    kind: "unsupported-cell-kind";
    message: string;
    cellType: string;
  } & IssueLocation)
  | ({
    kind: "pre-marker-content";
    message: string;
    lineCount: number;
  } & IssueLocation)
  | ({
    kind: "malformed-markdown-line";
    message: string;
  } & IssueLocation);

/** Handler can override the disposition per issue. */
export type IssueHandler =
  | ((issue: Issue) => IssueDisposition | void)
  | undefined;

export type EmittedIssue = Issue & {
  /** Final disposition after the handler override (if any). */
  readonly disposition: IssueDisposition;
};

export interface IssueSink {
  readonly issues: EmittedIssue[];
  readonly handler: IssueHandler;
}

export function emitIssue(
  issue: Issue,
  baseDisposition: IssueDisposition,
  sink: IssueSink,
): void {
  const override = sink.handler?.(issue);
  sink.issues.push({
    ...issue,
    disposition: typeof override === "string" ? override : baseDisposition,
  });
}
