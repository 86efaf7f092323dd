/**
 * percent/convert.ts
 * File-level conversions: pick the direction from the input suffix, derive
 * the output path when none is given, read once, transform in memory, write
 * once. Scripts use `# %%` markers whatever their path; another comment
 * prefix only comes from an explicit `language` option.
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { extname } from "node:path";
import {
  readNotebook,
  writeNotebook,
  type WriteNotebookOptions,
} from "../notebook/ipynb.ts";
import { decodePercentScript } from "./decode.ts";
import { encodePercentScript } from "./encode.ts";
import type { PercentOptions } from "./grammar.ts";
import type { EmittedIssue } from "./issues.ts";

export const NOTEBOOK_SUFFIX = ".ipynb";
export const SCRIPT_SUFFIX = ".py";

/** Bad invocation: missing input or unsupported suffix. Nothing was written. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type ConversionDirection = "ipynb-to-script" | "script-to-ipynb";

export interface ConversionPlan {
  readonly direction: ConversionDirection;
  readonly input: string;
  readonly output: string;
}

export interface ConversionResult extends ConversionPlan {
  readonly issues: readonly EmittedIssue[];
}

export type ConvertOptions = PercentOptions & WriteNotebookOptions;

/** `a/b.ipynb` → `a/b.py` and back; any other suffix is replaced as well. */
export function swapSuffix(path: string): string {
  const suffix = extname(path);
  const target = suffix === NOTEBOOK_SUFFIX ? SCRIPT_SUFFIX : NOTEBOOK_SUFFIX;
  return path.slice(0, path.length - suffix.length) + target;
}

export function planConversion(input: string, output?: string): ConversionPlan {
  if (!existsSync(input)) {
    throw new UsageError(`Input file does not exist: ${input}`);
  }
  const suffix = extname(input);
  if (suffix !== NOTEBOOK_SUFFIX && suffix !== SCRIPT_SUFFIX) {
    throw new UsageError(
      `Unsupported input extension "${suffix || "(none)"}" for ${input}: ` +
        `input must be a ${NOTEBOOK_SUFFIX} or ${SCRIPT_SUFFIX} file`,
    );
  }
  return {
    direction: suffix === NOTEBOOK_SUFFIX ? "ipynb-to-script" : "script-to-ipynb",
    input,
    output: output || swapSuffix(input),
  };
}

export function ipynbToPercentScript(
  input: string,
  output: string,
  options: PercentOptions = {},
): readonly EmittedIssue[] {
  const doc = readNotebook(input);
  const { text, issues } = encodePercentScript(doc, {
    ...options,
    filename: options.filename ?? input,
  });
  writeFileSync(output, text, "utf-8");
  return issues;
}

export function percentScriptToIpynb(
  input: string,
  output: string,
  options: ConvertOptions = {},
): readonly EmittedIssue[] {
  const text = readFileSync(input, "utf-8");
  const { cells, issues } = decodePercentScript(text, {
    ...options,
    filename: options.filename ?? input,
  });
  writeNotebook({ cells }, output, { cellId: options.cellId });
  return issues;
}

export function convertFile(init: {
  input: string;
  output?: string;
  options?: ConvertOptions;
}): ConversionResult {
  const plan = planConversion(init.input, init.output);
  const issues = plan.direction === "ipynb-to-script"
    ? ipynbToPercentScript(plan.input, plan.output, init.options)
    : percentScriptToIpynb(plan.input, plan.output, init.options);
  return { ...plan, issues };
}
