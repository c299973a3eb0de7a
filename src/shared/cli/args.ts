/**
 * CLI argument parsing with built-in --help and --version handling.
 */

import { parseArgs } from "node:util";

export interface CliOption {
  /** Long flag without the leading dashes */
  flag: string;
  short?: string;
  type: "string" | "boolean";
  default?: string | boolean;
  description: string;
  /** Shown after the flag in help output, e.g. "<path>" */
  placeholder?: string;
}

export interface HelpSection {
  title: string;
  options: CliOption[];
}

export interface CliSpec {
  commandName: string;
  description: string;
  version: string;
  /** e.g. "idsplit [options] [identifier ...]" */
  usage: string;
  sections: HelpSection[];
  /** Positional operands, listed under "Arguments:" */
  operands?: Array<{ name: string; description: string }>;
  examples?: string[];
}

export interface ParsedArgs {
  values: Record<string, string | boolean | undefined>;
  positionals: string[];
}

export type LineWriter = (line: string) => void;

const FLAG_COLUMN_WIDTH = 36;

const consoleWriter: LineWriter = (line) => {
  console.log(line);
};

function formatRow(label: string, description: string): string {
  const padding = " ".repeat(Math.max(1, FLAG_COLUMN_WIDTH - label.length));
  return `  ${label}${padding}${description}`;
}

export function formatHelp(spec: CliSpec): string[] {
  const lines: string[] = [spec.description, "", `Usage: ${spec.usage}`, ""];

  if (spec.operands && spec.operands.length > 0) {
    lines.push("Arguments:");
    for (const operand of spec.operands) {
      lines.push(formatRow(operand.name, operand.description));
    }
    lines.push("");
  }

  for (const section of spec.sections) {
    lines.push(`${section.title}:`);
    for (const opt of section.options) {
      const short = opt.short ? `-${opt.short}, ` : "    ";
      const label = `${short}--${opt.flag}${opt.placeholder ? ` ${opt.placeholder}` : ""}`;
      const defaultInfo = opt.default !== undefined ? ` (default: ${String(opt.default)})` : "";
      lines.push(formatRow(label, `${opt.description}${defaultInfo}`));
    }
    lines.push("");
  }

  lines.push("Common:");
  lines.push(formatRow("-h, --help", "Show this help message"));
  lines.push(formatRow("-v, --version", "Show version information"));
  lines.push("");

  if (spec.examples && spec.examples.length > 0) {
    lines.push("Examples:");
    for (const example of spec.examples) {
      lines.push(`  ${example}`);
    }
    lines.push("");
  }
  return lines;
}

export function renderHelp(spec: CliSpec, write: LineWriter = consoleWriter): void {
  for (const line of formatHelp(spec)) {
    write(line);
  }
}

export function renderVersion(
  commandName: string,
  version: string,
  write: LineWriter = consoleWriter
): void {
  write(`${commandName} v${version}`);
}

/**
 * Parses `args` against `spec`. --help and --version print and exit the
 * process with status 0.
 *
 * @param args Defaults to process.argv without the node binary and script
 */
export function defineCli(spec: CliSpec, args?: string[], write?: LineWriter): ParsedArgs {
  const options: Record<
    string,
    { type: "string" | "boolean"; short?: string; default?: string | boolean }
  > = {};

  for (const section of spec.sections) {
    for (const opt of section.options) {
      options[opt.flag] = {
        type: opt.type,
        ...(opt.short && { short: opt.short }),
        ...(opt.default !== undefined && { default: opt.default }),
      };
    }
  }
  options.help = { type: "boolean", short: "h" };
  options.version = { type: "boolean", short: "v" };

  const { values, positionals } = parseArgs({ args, options, allowPositionals: true });

  if (values.help) {
    renderHelp(spec, write);
    process.exit(0);
  }
  if (values.version) {
    renderVersion(spec.commandName, spec.version, write);
    process.exit(0);
  }

  return { values, positionals };
}
