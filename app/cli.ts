#!/usr/bin/env node
import { writeFile } from "node:fs/promises";

import { loadEnvConfig } from "../lib/env";
import { createDefaultEngine } from "../lib/multi-agent/competitor-intelligence-engine";
import type { AnalysisMode } from "../lib/multi-agent/types";
import { formatResults, toJsonReport } from "../lib/report";
import { createProgressReporter } from "./progress";
import type { AnalysisRunner } from "./server";

const VERSION = "0.1.0";

export interface CliOptions {
  input?: string;
  url: boolean;
  output?: string;
  quiet: boolean;
  help: boolean;
  version: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export interface CliDependencies {
  createEngine: () => AnalysisRunner;
  log: (line: string) => void;
  error: (line: string) => void;
  writeFile: (path: string, contents: string) => Promise<void>;
}

export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = { url: false, quiet: false, help: false, version: false };
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--url":
        options.url = true;
        break;
      case "--quiet":
      case "-q":
        options.quiet = true;
        break;
      case "--help":
      case "-h":
        options.help = true;
        break;
      case "--version":
      case "-V":
        options.version = true;
        break;
      case "--output":
      case "-o": {
        const value = args[i + 1];
        if (value === undefined || value.startsWith("-")) {
          throw new CliUsageError(`${arg} requires a file path`);
        }
        options.output = value;
        i++;
        break;
      }
      default:
        if (arg.startsWith("--output=")) {
          const value = arg.slice("--output=".length);
          if (!value) {
            throw new CliUsageError("--output requires a file path");
          }
          options.output = value;
        } else if (arg.startsWith("-") && arg !== "-") {
          throw new CliUsageError(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  if (positional.length > 1) {
    throw new CliUsageError("Provide the business description or URL as a single (quoted) argument");
  }
  options.input = positional[0];
  return options;
}

export function helpText(): string {
  return `Usage: competitor-intel [options] <business description | company URL>

Multi-agent competitor discovery, analysis and strategy.

Options:
  --url              Treat input as URL instead of description
  -o, --output FILE  Save results to a JSON file
  -q, --quiet        Minimal output (no progress)
  -h, --help         Show this help
  -V, --version      Show the version

Examples:
  # Analyze by description
  competitor-intel "AI project management tool for remote teams"

  # Analyze by URL
  competitor-intel --url https://example.com

  # Save output to file
  competitor-intel "SaaS CRM platform" --output report.json`;
}

/**
 * Runs the CLI and resolves to the process exit code.
 */
export async function runCli(args: string[], deps: CliDependencies): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(args);
  } catch (error) {
    if (error instanceof CliUsageError) {
      deps.error(`Error: ${error.message}`);
      deps.log(helpText());
      return 1;
    }
    throw error;
  }

  if (options.help) {
    deps.log(helpText());
    return 0;
  }
  if (options.version) {
    deps.log(VERSION);
    return 0;
  }

  const input = options.input?.trim();
  if (!input) {
    deps.error("Error: Please provide business description or URL");
    deps.log(helpText());
    return 1;
  }

  const mode: AnalysisMode = options.url ? "url" : "description";

  if (!options.quiet) {
    deps.log("🤖 Competitor Intelligence System");
    deps.log("Multi-Agent Analysis with LangChain & LangGraph\n");
  }
  deps.log(`Input: ${input}`);
  deps.log(`Mode: ${mode}\n`);

  try {
    const engine = deps.createEngine();
    const onEvent = options.quiet ? undefined : createProgressReporter(deps.log, deps.error);

    if (!options.quiet) {
      deps.log("🚀 Deploying Multi-Agent System...\n");
    }
    const finalState = await engine.run(input, mode, onEvent);

    deps.log(formatResults(finalState));

    if (options.output) {
      await deps.writeFile(options.output, JSON.stringify(toJsonReport(finalState), null, 2));
      deps.log(`\n✓ Results saved to: ${options.output}`);
    }
    return 0;
  } catch (error) {
    deps.error(`\n✗ Error: ${error instanceof Error ? error.message : String(error)}`);
    if (!options.quiet && error instanceof Error && error.stack) {
      deps.error(error.stack);
    }
    return 1;
  }
}

async function main(): Promise<void> {
  process.on("SIGINT", () => {
    console.log("\n⚠ Analysis interrupted by user");
    process.exit(1);
  });

  const exitCode = await runCli(process.argv.slice(2), {
    createEngine: () => createDefaultEngine(loadEnvConfig()),
    log: line => console.log(line),
    error: line => console.error(line),
    writeFile: (path, contents) => writeFile(path, contents, "utf-8"),
  });
  process.exit(exitCode);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error("[cli] Unexpected failure:", error);
    process.exit(1);
  });
}
