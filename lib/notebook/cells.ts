/**
 * notebook/cells.ts
 * The ordered-cell data model shared by the `.ipynb` adapter and the
 * percent-script codec. Cell order is reading order and is never changed.
 */

interface CellBase {
  /** Container cell id, when the cell came from (or is going to) a notebook. */
  readonly id?: string;
  readonly source: string;
}

export interface CodeCell extends CellBase {
  readonly kind: "code";
}

export interface MarkdownCell extends CellBase {
  readonly kind: "markdown";
}

/** Any container cell type with no percent-script form (e.g. `raw`). */
export interface OtherCell extends CellBase {
  readonly kind: "other";
  readonly cellType: string;
}

export type NotebookCell = CodeCell | MarkdownCell | OtherCell;

export interface PercentDocument {
  readonly cells: readonly NotebookCell[];
}

export const newCodeCell = (source: string): CodeCell => ({
  kind: "code",
  source,
});

export const newMarkdownCell = (source: string): MarkdownCell => ({
  kind: "markdown",
  source,
});

export const newOtherCell = (cellType: string, source: string): OtherCell => ({
  kind: "other",
  cellType,
  source,
});
