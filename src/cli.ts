import fs from "fs";
import path from "path";
import { Command, InvalidArgumentError, Option } from "commander";
import { DEFAULT_ALGORITHM, DEFAULT_KEEP_POLICY, OUTPUT_FILE_NAME } from "./config";
import { ScanController } from "./controller";
import { ConfigurationError, errorMessage } from "./errors";
import { HASH_ALGORITHMS, parseHashAlgorithm } from "./hash";
import { createProgressReporter } from "./progress";
import { formatReport, formatSummary, toJson } from "./report";
import { HashAlgorithm, KeepPolicy, ScanResult } from "./types";

const fsp = fs.promises;

interface CliOptions {
  ext: string[];
  minSize: number;
  maxSize: number;
  exclude: string[];
  skipHidden: boolean;
  skipSystem: boolean;
  algorithm: HashAlgorithm;
  keep: string;
  verify: boolean;
  output: string;
  json: boolean;
  progress: boolean;
  quiet: boolean;
}

function parseByteCount(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError("Expected a whole number of bytes.");
  }
  return parsed;
}

function parseAlgorithm(value: string): HashAlgorithm {
  try {
    return parseHashAlgorithm(value);
  } catch (err) {
    throw new InvalidArgumentError(errorMessage(err));
  }
}

function collectList(value: string, previous: string[]): string[] {
  return previous.concat(value.split(",").map((part) => part.trim()).filter(Boolean));
}

function collectRepeated(value: string, previous: string[]): string[] {
  return previous.concat(value);
}

export function createProgram(): Command {
  return new Command()
    .name("dupsieve")
    .description("Find duplicate files by content")
    .argument("<directory>", "directory to scan")
    .option("-e, --ext <list>", "only consider these extensions (comma separated)", collectList, [])
    .option("--min-size <bytes>", "ignore files smaller than this", parseByteCount, 0)
    .option("--max-size <bytes>", "ignore files larger than this (0 = no limit)", parseByteCount, 0)
    .option("-x, --exclude <pattern>", "skip files whose name or path matches (repeatable)", collectRepeated, [])
    .option("--skip-hidden", "skip hidden files", false)
    .option("--no-skip-system", "include system files")
    .addOption(
      new Option("-a, --algorithm <name>", `hash algorithm (${HASH_ALGORITHMS.join(", ")})`)
        .argParser(parseAlgorithm)
        .default(DEFAULT_ALGORITHM)
    )
    .addOption(
      new Option("-k, --keep <policy>", "which copy to keep")
        .choices(["oldest", "newest"])
        .default(DEFAULT_KEEP_POLICY)
    )
    .option("--verify", "confirm matches with a full byte comparison", false)
    .option("-o, --output <file>", `report file, "-" for stdout (default: <directory>/${OUTPUT_FILE_NAME})`, "")
    .option("--json", "write the report as JSON", false)
    .option("--no-progress", "do not show progress on stderr")
    .option("-q, --quiet", "do not print per-file errors", false);
}

function isKeepPolicy(value: string): value is KeepPolicy {
  return value === "oldest" || value === "newest";
}

async function writeReport(result: ScanResult, options: CliOptions, outputPath: string | null): Promise<void> {
  const text = options.json ? toJson(result) : formatReport(result) + formatSummary(result);
  if (outputPath === null) {
    process.stdout.write(text);
    return;
  }
  await fsp.writeFile(outputPath, text, "utf8");
  console.log(`Duplicate report written to: ${outputPath}`);
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  program.parse(argv);

  const options = program.opts<CliOptions>();
  const rootDir = path.resolve(program.args[0]);
  const outputPath =
    options.output === "-"
      ? null
      : path.resolve(options.output || path.join(rootDir, OUTPUT_FILE_NAME));
  const keep = isKeepPolicy(options.keep) ? options.keep : DEFAULT_KEEP_POLICY;

  const reporter = createProgressReporter(options.progress && process.stderr.isTTY === true);
  const controller = new ScanController();
  const onInterrupt = () => {
    if (controller.cancel()) {
      console.error("\nCancelling scan...");
    }
  };
  process.on("SIGINT", onInterrupt);

  try {
    const result = await controller.scan(
      {
        root: rootDir,
        filter: {
          extensions: options.ext,
          minSize: options.minSize,
          maxSize: options.maxSize,
          excludePatterns: options.exclude,
          skipHidden: options.skipHidden,
          skipSystem: options.skipSystem
        },
        algorithm: options.algorithm,
        keep,
        verify: options.verify,
        excludePaths: outputPath ? [outputPath] : []
      },
      {
        onPhase: (phase, progress) => reporter.phase(phase, progress),
        onProgress: (progress) => reporter.update(progress),
        onError: (record) => {
          if (!options.quiet) {
            const action = record.kind === "hashing" ? "hashing file" : "reading";
            console.error(`Error ${action}: ${record.path}: ${record.reason}`);
          }
        }
      }
    );

    reporter.finish(result);
    if (result.errorCount > 0) {
      console.error(`${result.errorCount} files could not be scanned.`);
    }
    await writeReport(result, options, outputPath);

    if (result.status === "failed") {
      console.error(`Scan failed: ${result.failure ?? "unknown error"}`);
      process.exitCode = 1;
    } else if (result.status === "cancelled") {
      process.exitCode = 130;
    }
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(err.message);
      program.outputHelp({ error: true });
    } else {
      console.error(`Failed to build duplicate report: ${errorMessage(err)}`);
    }
    process.exitCode = 1;
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}
