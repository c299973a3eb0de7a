#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import readline from "node:readline";
import { fileURLToPath, pathToFileURL } from "node:url";

import { z } from "zod";

import { defineCli, type CliSpec, type ParsedArgs } from "../shared/cli/args.js";
import { loadSplitterConfig, type ConfigOverrides } from "../shared/config.js";
import { createLogger, isLogLevel, LOG_LEVELS } from "../shared/logger.js";
import { parseList, parsePositiveInt } from "../shared/utils/validation.js";
import { createSplitterFromConfig } from "../splitter/loader.js";

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  /** Identifier source used when no identifiers are given as arguments */
  stdin: () => AsyncIterable<string>;
  /** Base directory for config discovery and relative paths (default: process.cwd()) */
  cwd?: string;
  /** Environment read for IDSPLIT_* settings (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

const PackageJsonSchema = z.object({ version: z.string() });

function readPackageVersion(): string {
  const currentDir = path.dirname(fileURLToPath(import.meta.url));
  const packagePath = path.join(currentDir, "../../package.json");
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(fs.readFileSync(packagePath, "utf8")));
    return parsed.success ? parsed.data.version : "0.0.0";
  } catch {
    // running from a copied dist/ without its package.json
    return "0.0.0";
  }
}

export const CLI_SPEC: CliSpec = {
  commandName: "idsplit",
  description: "Split concatenated program identifiers into word tokens",
  version: readPackageVersion(),
  usage: "idsplit [options] [identifier ...]",
  operands: [
    {
      name: "identifier",
      description: "Identifiers to split; read line by line from stdin when omitted",
    },
  ],
  sections: [
    {
      title: "Data",
      options: [
        {
          flag: "frequencies",
          type: "string",
          placeholder: "<path>",
          description: "Token frequency table (token<TAB>count per line)",
        },
        {
          flag: "dictionary",
          type: "string",
          placeholder: "<paths>",
          description: "Comma-separated word list files",
        },
        {
          flag: "config",
          type: "string",
          placeholder: "<path>",
          description: "YAML config (default: .idsplit/config.yml)",
        },
      ],
    },
    {
      title: "Splitting",
      options: [
        {
          flag: "max-length",
          type: "string",
          placeholder: "<n>",
          description: "Reject identifiers longer than n characters",
        },
        {
          flag: "drop-digits",
          type: "boolean",
          description: "Drop digit runs instead of emitting them as tokens",
        },
      ],
    },
    {
      title: "Output",
      options: [
        {
          flag: "json",
          type: "boolean",
          description: "Print one JSON array per identifier",
        },
        {
          flag: "log-level",
          type: "string",
          placeholder: "<level>",
          description: `Diagnostics on stderr: ${LOG_LEVELS.join(", ")}`,
        },
      ],
    },
  ],
  examples: [
    "idsplit --frequencies freq.tsv --dictionary words.txt getMAX usage_getdata",
    "idsplit --log-level debug GPSmodule",
    "cat identifiers.txt | idsplit --json",
  ],
};

function stringValue(values: ParsedArgs["values"], key: string): string | undefined {
  const value = values[key];
  return typeof value === "string" ? value : undefined;
}

function buildOverrides(values: ParsedArgs["values"]): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  const frequencies = stringValue(values, "frequencies");
  if (frequencies !== undefined) {
    overrides.frequencies = frequencies;
  }
  const dictionary = parseList(stringValue(values, "dictionary"));
  if (dictionary !== undefined) {
    overrides.dictionary = dictionary;
  }
  const maxLength = parsePositiveInt(stringValue(values, "max-length"), "max length");
  if (maxLength !== undefined) {
    overrides.maxIdentifierLength = maxLength;
  }
  if (values["drop-digits"] === true) {
    overrides.keepDigits = false;
  }
  const level = stringValue(values, "log-level")?.trim().toLowerCase();
  if (level !== undefined) {
    if (!isLogLevel(level)) {
      throw new Error(`Invalid log level: "${level}". Expected one of ${LOG_LEVELS.join(", ")}.`);
    }
    overrides.logLevel = level;
  }
  return overrides;
}

function defaultIO(): CliIO {
  return {
    stdout: (line) => {
      process.stdout.write(`${line}\n`);
    },
    stderr: (line) => {
      process.stderr.write(`${line}\n`);
    },
    stdin: () => readline.createInterface({ input: process.stdin, crlfDelay: Infinity }),
  };
}

/**
 * Runs the CLI and resolves with the process exit code.
 */
export async function runCli(argv: string[], io: CliIO = defaultIO()): Promise<number> {
  try {
    const { values, positionals } = defineCli(CLI_SPEC, argv, io.stdout);
    const configPath = stringValue(values, "config");
    const config = loadSplitterConfig({
      overrides: buildOverrides(values),
      ...(io.cwd !== undefined && { cwd: io.cwd }),
      ...(io.env !== undefined && { env: io.env }),
      ...(configPath !== undefined && { configPath }),
    });
    const logger = createLogger({
      level: config.logLevel,
      sink: (_level, line) => io.stderr(line),
    });
    const splitter = createSplitterFromConfig(config, logger);
    const asJson = values.json === true;

    const emit = (identifier: string): void => {
      const tokens = splitter.split(identifier);
      io.stdout(asJson ? JSON.stringify(tokens) : tokens.join(" "));
    };

    if (positionals.length > 0) {
      positionals.forEach(emit);
      return 0;
    }
    for await (const line of io.stdin()) {
      const identifier = line.trim();
      if (identifier.length > 0) {
        emit(identifier);
      }
    }
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr(`[IDSPLIT] ${message}`);
    return 1;
  }
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? "").href) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error("idsplit failed unexpectedly.");
      console.error(error);
      process.exitCode = 1;
    });
}
