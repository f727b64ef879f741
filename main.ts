#!/usr/bin/env node
/**
 * Usage:
 *   gltf-timing-repair <input.gltf> [output.gltf] [options]
 *
 * Options:
 *   --fps N          frame rate used to regenerate timestamps (default 30)
 *   --threshold X    magnitude above which a bound is a sentinel (default 1e100)
 *   --suffix S       suffix for derived output names (default _fixed)
 *   --bin PATH       output binary path (default: beside the output document)
 *   --log FILE       also write the log to FILE
 *   --quiet          only print the final report
 *
 * Exit codes: 0 all samplers fine, 1 some samplers failed, 2 run aborted.
 */

import { existsSync } from "fs";
import { basename, dirname, extname, join } from "path";
import { fixScene } from "./src/fixer";
import { formatReport } from "./src/report";
import { RepairOptions } from "./src/config";
import { TimingRepairError } from "./src/errors";
import * as logger from "./src/logger";

function die(msg: string): never {
  console.error(`Error: ${msg}`);
  process.exit(2);
}

function numberArg(flag: string, value: string | undefined): number {
  const n = Number(value);
  if (value === undefined || Number.isNaN(n)) die(`${flag} needs a number`);
  return n;
}

interface CliArgs {
  input: string;
  options: Partial<RepairOptions>;
  logFile?: string;
  quiet: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  const options: Partial<RepairOptions> = {};
  let logFile: string | undefined;
  let binPath: string | undefined;
  let quiet = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--fps":
        options.frameRate = numberArg(arg, argv[++i]);
        break;
      case "--threshold":
        options.corruptionThreshold = numberArg(arg, argv[++i]);
        break;
      case "--suffix":
        options.outputSuffix = argv[++i] ?? die("--suffix needs a value");
        break;
      case "--bin":
        binPath = argv[++i] ?? die("--bin needs a path");
        break;
      case "--log":
        logFile = argv[++i] ?? die("--log needs a path");
        break;
      case "--quiet":
        quiet = true;
        break;
      default:
        if (arg.startsWith("--")) die(`unknown option ${arg}`);
        positional.push(arg);
    }
  }

  if (positional.length < 1 || positional.length > 2) {
    die("usage: gltf-timing-repair <input.gltf> [output.gltf] [--fps N] [--threshold X] [--suffix S] [--bin PATH] [--log FILE] [--quiet]");
  }
  const [input, output] = positional;
  if (output) {
    options.outputPaths = {
      metadataPath: output,
      binaryPath: binPath || join(dirname(output), `${basename(output, extname(output))}.bin`),
    };
  } else if (binPath) {
    die("--bin needs an explicit output document");
  }

  return { input, options, logFile, quiet };
}

function main(): void {
  const args = parseArgs(process.argv.slice(2));
  if (args.quiet) logger.setLogLevel("error");
  if (args.logFile) logger.initLogger(args.logFile);

  if (!existsSync(args.input)) die(`file not found: ${args.input}`);

  try {
    const report = fixScene(args.input, args.options);
    console.log(formatReport(report).join("\n"));
    process.exitCode = report.failures.length === 0 ? 0 : 1;
  } catch (err) {
    if (!(err instanceof TimingRepairError)) throw err;
    logger.error(err.message);
    process.exitCode = 2;
  } finally {
    logger.closeLogger();
  }
}

main();
