#!/usr/bin/env tsx
/**
 * chromolift command-line interface
 *
 * Converts a scaffold-space GFF3 into chromosome space using an AGP map.
 * Lifted GFF3 goes to stdout (or `--output`); help, manual, version and
 * progress text go to stderr.
 *
 * @module cli
 */

import { Command, CommanderError, Option } from "commander";
import { once } from "node:events";
import { pathToFileURL } from "node:url";
import { LiftoverError } from "./errors";
import { VERSION } from "./index";
import { exists } from "./io/file-reader";
import { writeLines } from "./io/file-writer";
import { liftoverFiles } from "./liftover";
import type { ExtentMode, LiftoverProgress } from "./liftover";

export const SCRIPT_NAME = "chromolift";

export const EXIT_CODES = {
  SUCCESS: 0,
  HELP: 1,
  USAGE: 2,
  MISSING_AGP: 3,
  MISSING_GFF: 4,
  FAILURE: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Streams the CLI talks to, replaceable in tests
 */
export interface CliIO {
  /** Destination for lifted GFF3 when no `--output` is given */
  readonly stdout: NodeJS.WritableStream;
  /** Receives one diagnostic message per call */
  readonly stderr: (message: string) => void;
}

type CliOptions = {
  agp?: string;
  gff?: string;
  output?: string;
  debug?: boolean;
  help?: boolean;
  version?: boolean;
  man?: boolean;
  extentMode?: ExtentMode;
  alwaysEmitSequenceRegions?: boolean;
};

const DESCRIPTION = `${SCRIPT_NAME} converts a GFF3 from scaffold-space into chromosome-space
using an AGP file that maps scaffolds to chromosomes.

Features on scaffolds placed in reverse orientation have their start and end
mirrored around the placement and their strand flipped. Features on
scaffolds absent from the AGP are written unchanged. ##sequence-region
headers for placed scaffolds are replaced by one header per chromosome.`;

const SYNOPSIS = `${SCRIPT_NAME} -a [AGP file] -g [Scaffold GFF3 file] > [Chromosome GFF3 file]`;

const EXIT_STATUS = `Exit status:
  0  success, or --version / --man
  1  --help
  2  missing mandatory option or invalid usage
  3  AGP file does not exist
  4  GFF3 file does not exist
  5  malformed input or any other failure`;

function createProgram(): Command {
  return new Command()
    .name(SCRIPT_NAME)
    .usage("-a <agp> -g <gff> [options]")
    .description("Convert scaffold-based GFF3 to chromosome-based GFF3 using an AGP")
    .helpOption(false)
    .option("-a, --agp <file>", "AGP file mapping scaffolds to chromosomes (mandatory)")
    .option("-g, --gff <file>", "GFF3 file of features in scaffold-space (mandatory)")
    .option("-o, --output <file>", "write chromosome-space GFF3 here instead of stdout")
    .option("-d, --debug", "comment each record whose scaffold is not in the AGP")
    .addOption(
      new Option("--extent-mode <mode>", "chromosome extent in sequence-region headers")
        .choices(["last", "span"])
        .default("last")
    )
    .option(
      "--always-emit-sequence-regions",
      "write chromosome sequence-region headers even if the input has no headers"
    )
    .option("-h, --help", "display this help documentation")
    .option("-v, --version", "output version string")
    .option("--man", "display the full manual")
    .allowExcessArguments(false)
    .exitOverride();
}

function manual(program: Command): string {
  return [
    "NAME",
    `    ${SCRIPT_NAME} - Convert scaffold-based GFF3 to chromosome-based GFF3 using AGP`,
    "",
    "SYNOPSIS",
    `    ${SYNOPSIS}`,
    "",
    program.helpInformation().trimEnd(),
    "",
    "DESCRIPTION",
    DESCRIPTION.replace(/^/gm, "    "),
    "",
    EXIT_STATUS,
  ].join("\n");
}

function progressMessage(progress: LiftoverProgress): string {
  switch (progress.stage) {
    case "reading-assembly":
      return "Reading AGP";
    case "assembly-read":
      return `Done reading AGP, found ${progress.scaffolds} scaffolds`;
    case "transforming":
      return "Reading scaffold-based GFF3 and outputting chromosome-based GFF3";
  }
}

async function writeToStream(
  stream: NodeJS.WritableStream,
  lines: AsyncIterable<string>
): Promise<void> {
  for await (const line of lines) {
    if (!stream.write(`${line}\n`)) {
      await once(stream, "drain");
    }
  }
}

/**
 * Run the CLI and resolve with its exit status
 *
 * Never calls `process.exit`.
 *
 * @example
 * ```typescript
 * const code = await runCli(["-a", "chromosomes.agp", "-g", "scaffolds.gff3"]);
 * ```
 */
export async function runCli(
  args: readonly string[],
  io: CliIO = { stdout: process.stdout, stderr: (message) => console.error(message) }
): Promise<ExitCode> {
  const program = createProgram().configureOutput({
    writeOut: (text) => io.stderr(text.trimEnd()),
    writeErr: (text) => io.stderr(text.trimEnd()),
  });

  try {
    program.parse(
      args.map((arg) => (arg === "-?" ? "--help" : arg)),
      { from: "user" }
    );
  } catch (error) {
    if (error instanceof CommanderError) {
      io.stderr(`Usage: ${SYNOPSIS}`);
      return EXIT_CODES.USAGE;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();

  if (options.help === true) {
    io.stderr(program.helpInformation().trimEnd());
    return EXIT_CODES.HELP;
  }
  if (options.man === true) {
    io.stderr(manual(program));
    return EXIT_CODES.SUCCESS;
  }
  if (options.version === true) {
    io.stderr(`${SCRIPT_NAME} version ${VERSION}`);
    return EXIT_CODES.SUCCESS;
  }

  const { agp, gff } = options;
  if (agp === undefined || agp === "" || gff === undefined || gff === "") {
    io.stderr(`Usage: ${SYNOPSIS}`);
    return EXIT_CODES.USAGE;
  }

  try {
    if (!(await exists(agp))) {
      io.stderr("The AGP input file does not exist.");
      return EXIT_CODES.MISSING_AGP;
    }
    if (!(await exists(gff))) {
      io.stderr("The GFF3 input file does not exist.");
      return EXIT_CODES.MISSING_GFF;
    }

    const lines = liftoverFiles({
      agpPath: agp,
      gffPath: gff,
      debug: options.debug === true,
      extentMode: options.extentMode ?? "last",
      alwaysEmitSequenceRegions: options.alwaysEmitSequenceRegions === true,
      onProgress: (progress) => io.stderr(progressMessage(progress)),
    });

    if (options.output !== undefined) {
      await writeLines(options.output, lines, { atomic: true });
    } else {
      await writeToStream(io.stdout, lines);
    }

    io.stderr("Done reading scaffold-based GFF3 and outputting chromosome-based GFF3");
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    io.stderr(error instanceof LiftoverError ? error.toString() : String(error));
    return EXIT_CODES.FAILURE;
  }
}

if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
  process.exitCode = await runCli(process.argv.slice(2));
}
