/**
 * notebook/ipynb.ts
 * Read/write adapter between Jupyter `.ipynb` JSON (nbformat 4) and the
 * ordered-cell model in `cells.ts`.
 *
 * Reading keeps only what the percent codec needs: each cell's kind, its id
 * and its source text (string or array-of-lines form, joined). Outputs,
 * execution counts and metadata are dropped.
 *
 * Writing produces a fresh nbformat 4.5 notebook shaped the way the Jupyter
 * reference writer lays it out: sorted keys, one-space indent, `source` as
 * an array of lines that keep their endings, one trailing newline.
 *
 * I/O and JSON syntax errors propagate untouched; envelope problems are
 * reported as `NotebookFormatError`.
 */

import { randomBytes } from "node:crypto";
import { readFileSync, writeFileSync } from "node:fs";
import { z } from "zod";
import { stringifySorted } from "../universal/json.ts";
import { splitLines } from "../universal/whitespace.ts";
import {
  newCodeCell,
  newMarkdownCell,
  newOtherCell,
  type NotebookCell,
  type PercentDocument,
} from "./cells.ts";

/* ============================== Schema =================================== */

const multilineString = z.union([z.string(), z.array(z.string())]);

export const ipynbCellSchema = z.looseObject({
  cell_type: z.string().min(1),
  id: z.string().optional(),
  metadata: z.record(z.string(), z.unknown()).optional(),
  source: multilineString,
});

export const ipynbSchema = z.looseObject({
  nbformat: z.literal(4),
  nbformat_minor: z.number().int().nonnegative(),
  metadata: z.record(z.string(), z.unknown()),
  cells: z.array(ipynbCellSchema),
});

export type IpynbInput = z.infer<typeof ipynbSchema>;

/** Cell as written; code cells also carry `execution_count` and `outputs`. */
export interface IpynbCell {
  cell_type: string;
  id: string;
  metadata: Record<string, unknown>;
  source: string[];
  execution_count?: null;
  outputs?: unknown[];
}

export interface IpynbNotebook {
  cells: IpynbCell[];
  metadata: Record<string, unknown>;
  nbformat: 4;
  nbformat_minor: 5;
}

export class NotebookFormatError extends Error {
  constructor(readonly filename: string, readonly detail: string) {
    super(`${filename} is not a valid nbformat 4 notebook:\n${detail}`);
    this.name = "NotebookFormatError";
  }
}

/* ============================== Reading ================================== */

const joinSource = (source: string | string[]) =>
  Array.isArray(source) ? source.join("") : source;

function toCell(cell: IpynbInput["cells"][number]): NotebookCell {
  const source = joinSource(cell.source);
  const base = cell.cell_type === "code"
    ? newCodeCell(source)
    : cell.cell_type === "markdown"
    ? newMarkdownCell(source)
    : newOtherCell(cell.cell_type, source);
  return cell.id === undefined ? base : { ...base, id: cell.id };
}

export function parseNotebook(
  json: string,
  filename = "notebook.ipynb",
): PercentDocument {
  const parsed = ipynbSchema.safeParse(JSON.parse(json));
  if (!parsed.success) {
    throw new NotebookFormatError(filename, z.prettifyError(parsed.error));
  }
  return { cells: parsed.data.cells.map(toCell) };
}

export function readNotebook(path: string): PercentDocument {
  return parseNotebook(readFileSync(path, "utf-8"), path);
}

/* ============================== Writing ================================== */

export type CellIdFactory = () => string;

/** 8 hex digits, the same shape Jupyter gives new cells. */
export const randomCellId: CellIdFactory = () =>
  randomBytes(4).toString("hex");

export interface WriteNotebookOptions {
  readonly cellId?: CellIdFactory;
}

function toIpynbCell(cell: NotebookCell, cellId: CellIdFactory): IpynbCell {
  const common = {
    id: cell.id ?? cellId(),
    metadata: {},
    source: splitLines(cell.source, { keepEnds: true }),
  };
  switch (cell.kind) {
    case "code":
      return {
        cell_type: "code",
        execution_count: null,
        outputs: [],
        ...common,
      };
    case "markdown":
      return { cell_type: "markdown", ...common };
    case "other":
      return { cell_type: cell.cellType, ...common };
  }
}

export function newNotebook(
  doc: PercentDocument,
  opts: WriteNotebookOptions = {},
): IpynbNotebook {
  const cellId = opts.cellId ?? randomCellId;
  return {
    cells: doc.cells.map((c) => toIpynbCell(c, cellId)),
    metadata: {},
    nbformat: 4,
    nbformat_minor: 5,
  };
}

export function stringifyNotebook(
  doc: PercentDocument,
  opts: WriteNotebookOptions = {},
): string {
  return stringifySorted(newNotebook(doc, opts), { indent: 1 });
}

export function writeNotebook(
  doc: PercentDocument,
  path: string,
  opts: WriteNotebookOptions = {},
): void {
  writeFileSync(path, stringifyNotebook(doc, opts), "utf-8");
}
