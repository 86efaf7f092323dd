import {
  deepStrictEqual as assertEquals,
  throws as assertThrows,
} from "node:assert/strict";
import { test } from "node:test";
import { z } from "zod";
import {
  decodeMarkdownLine,
  encodeMarkdownLine,
  markerKind,
  resolvePercentOptions,
} from "./grammar.ts";

const { grammar: py } = resolvePercentOptions({}, "notebook.py");

test("resolvePercentOptions", async (t) => {
  await t.test("python defaults", () => {
    const resolved = resolvePercentOptions({}, "fallback.py");
    assertEquals(resolved.filename, "fallback.py");
    assertEquals(resolved.issueHandler, undefined);
    assertEquals(resolved.grammar, {
      languageId: "python",
      commentPrefix: "#",
      marker: "# %%",
      markdownQualifier: "[markdown]",
      codeMarkerLine: "# %%",
      markdownMarkerLine: "# %% [markdown]",
    });
  });

  await t.test("language alias picks the comment prefix", () => {
    const { grammar } = resolvePercentOptions({ language: "ts" }, "x");
    assertEquals(grammar.languageId, "typescript");
    assertEquals(grammar.codeMarkerLine, "// %%");
    assertEquals(grammar.markdownMarkerLine, "// %% [markdown]");
  });

  await t.test("custom marker token, qualifier and filename", () => {
    const resolved = resolvePercentOptions({
      markerToken: "In[]",
      markdownQualifier: "[md]",
      filename: "analysis.py",
    }, "x");
    assertEquals(resolved.filename, "analysis.py");
    assertEquals(resolved.grammar.markdownMarkerLine, "# In[] [md]");
  });

  await t.test("unknown language is rejected", () => {
    assertThrows(
      () => resolvePercentOptions({ language: "cobol" }, "x"),
      /Unknown language "cobol"/,
    );
  });

  await t.test("marker token with whitespace fails validation", () => {
    assertThrows(
      () => resolvePercentOptions({ markerToken: "% %" }, "x"),
      z.ZodError,
    );
  });
});

test("marker line recognition", async (t) => {
  await t.test("qualifier absent opens code, present opens markdown", () => {
    assertEquals(markerKind("# %%", py), "code");
    assertEquals(markerKind("# %% [markdown]", py), "markdown");
  });

  await t.test("trailing text after the marker", () => {
    assertEquals(markerKind("# %% Load data", py), "code");
    assertEquals(markerKind("# %%[markdown]", py), "markdown");
    assertEquals(markerKind("# %% Load data [markdown]", py), "markdown");
    assertEquals(markerKind("# %%%", py), "code");
  });

  await t.test("only matches at column 0", () => {
    assertEquals(markerKind(" # %%", py), undefined);
    assertEquals(markerKind("\t# %% [markdown]", py), undefined);
    assertEquals(markerKind("x = 1  # %%", py), undefined);
  });

  await t.test("near misses are content", () => {
    assertEquals(markerKind("#%%", py), undefined);
    assertEquals(markerKind("# %", py), undefined);
    assertEquals(markerKind("## %%", py), undefined);
    assertEquals(markerKind("", py), undefined);
  });
});

test("markdown content lines", async (t) => {
  await t.test("encode", () => {
    assertEquals(encodeMarkdownLine("Some text", py), "# Some text");
    assertEquals(encodeMarkdownLine("  indented", py), "#   indented");
    assertEquals(encodeMarkdownLine("", py), "#");
    assertEquals(encodeMarkdownLine(" \t ", py), "#");
  });

  await t.test("decode strips exactly one prefix layer", () => {
    assertEquals(decodeMarkdownLine("# Some text", py), "Some text");
    assertEquals(decodeMarkdownLine("# # Heading", py), "# Heading");
    assertEquals(decodeMarkdownLine("#  two spaces", py), " two spaces");
    assertEquals(decodeMarkdownLine("#", py), "");
  });

  await t.test("bare prefix drops following whitespace", () => {
    assertEquals(decodeMarkdownLine("#tight", py), "tight");
    assertEquals(decodeMarkdownLine("#\tTabbed", py), "Tabbed");
  });

  await t.test("lines without a prefix are not decoded", () => {
    assertEquals(decodeMarkdownLine("plain", py), undefined);
    assertEquals(decodeMarkdownLine(" # late", py), undefined);
  });
});
