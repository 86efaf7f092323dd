import chalk, { type ChalkInstance } from "chalk";
import { Command } from "commander";
import { z } from "zod";
import { getLanguageByIdOrAlias } from "../universal/content/code.ts";
import {
  type ConversionResult,
  convertFile,
  NOTEBOOK_SUFFIX,
  SCRIPT_SUFFIX,
  UsageError,
} from "./convert.ts";
import type { EmittedIssue } from "./issues.ts";

export const cliOptionsSchema = z.object({
  quiet: z.boolean().default(false),
  verbose: z.boolean().default(false),
  language: z.string().min(1).optional(),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

/** Where the CLI reports; stdout/stderr unless a caller captures them. */
export interface CliReporter {
  info(line: string): void;
  warn(line: string): void;
}

const consoleReporter: CliReporter = {
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
};

export class PercentCLI {
  readonly reporter: CliReporter;
  readonly colors: ChalkInstance;

  constructor(init: { reporter?: CliReporter; colors?: ChalkInstance } = {}) {
    this.reporter = init.reporter ?? consoleReporter;
    this.colors = init.colors ?? chalk;
  }

  convert(input: string, output: string | undefined, opts: CliOptions) {
    if (opts.language && !getLanguageByIdOrAlias(opts.language)) {
      throw new UsageError(`Unknown language: ${opts.language}`);
    }
    const result = convertFile({
      input,
      output,
      options: { language: opts.language },
    });
    this.report(result, opts);
    return result;
  }

  report(result: ConversionResult, opts: CliOptions) {
    if (opts.quiet) return;
    for (const issue of result.issues) {
      if (issue.disposition === "lint" && !opts.verbose) continue;
      this.reporter.warn(this.formatIssue(issue));
    }
    this.reporter.info(`${result.input} -> ${result.output}`);
  }

  formatIssue(issue: EmittedIssue) {
    const c = this.colors;
    const where = issue.line !== undefined
      ? `${issue.filename}:${issue.line}`
      : issue.cellIndex !== undefined
      ? `${issue.filename} cell ${issue.cellIndex}`
      : issue.filename;
    const paint = issue.disposition === "error"
      ? c.red
      : issue.disposition === "warning"
      ? c.yellow
      : c.gray;
    return `${paint(issue.message)} ${c.dim(`(${where})`)}`;
  }

  command(init?: { name?: string }) {
    return new Command()
      .name(init?.name ?? "ipypercent")
      .version("0.1.0")
      .description(
        `Convert between ${NOTEBOOK_SUFFIX} notebooks and percent-format ${SCRIPT_SUFFIX} scripts based on file extension.`,
      )
      .argument("<input>", `Input ${NOTEBOOK_SUFFIX} or ${SCRIPT_SUFFIX} file`)
      .argument(
        "[output]",
        "Optional output file. If omitted, uses same name with swapped extension.",
      )
      .option("-q, --quiet", "Report fatal errors only", false)
      .option("-v, --verbose", "Also report lint-level issues", false)
      .option(
        "--language <id>",
        "Language whose line comment frames the markers (default: python)",
      )
      .action(
        (
          input: string,
          output: string | undefined,
          rawOpts: unknown,
          cmd: Command,
        ) => {
          const opts = cliOptionsSchema.parse(rawOpts);
          try {
            this.convert(input, output, opts);
          } catch (error) {
            if (error instanceof UsageError) {
              cmd.error(`error: ${error.message}`, {
                exitCode: 2,
                code: "ipypercent.usage",
              });
            }
            cmd.error(
              `error: ${error instanceof Error ? error.message : String(error)}`,
              { exitCode: 1, code: "ipypercent.failed" },
            );
          }
        },
      );
  }
}
