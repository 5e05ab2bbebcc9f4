#!/usr/bin/env node
import { Command } from "commander";
import { ScaffoldOptions } from "../../../domain/model/ScaffoldOptions";
import { runBuildCommand } from "./commands/buildCommand";
import { Container, createContainer } from "./di/dependencyContainer";
import { parseLineRange } from "./options/lineRange";

export const CLI_VERSION = "0.1.0";

interface BuildFlags {
  root?: string;
  lines?: ScaffoldOptions["lineRange"];
  exclude: string[];
  keepLog?: boolean;
  log: boolean;
  dryRun?: boolean;
  verbose?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Construye el programa de línea de comandos
 * @param makeContainer Fábrica de dependencias, según la verbosidad pedida
 */
export function createProgram(
  makeContainer: (verbose: boolean) => Container = createContainer
): Command {
  const program = new Command();

  program
    .name("docframe")
    .description("Build the file tree described in a document and fill it from its code blocks")
    .version(CLI_VERSION);

  program
    .command("build")
    .description("Create the directories and files described in <document>")
    .argument("<document>", "text or markdown document describing the tree")
    .option("-r, --root <dir>", "build directory (default: the document's directory)")
    .option("-l, --lines <start-end>", "only use these lines of the document", parseLineRange)
    .option("-e, --exclude <pattern>", "gitignore-style pattern to leave out (repeatable)", collect, [])
    .option("--keep-log", "keep the build log even when the build succeeds")
    .option("--no-log", "do not write a build log")
    .option("--dry-run", "parse and print the plan without writing anything")
    .option("-v, --verbose", "print every step")
    .action((document: string, flags: BuildFlags) => {
      const container = makeContainer(flags.verbose ?? false);
      const defaults = container.defaultOptions;
      const options: ScaffoldOptions = {
        ...defaults,
        documentPath: document,
        rootPath: flags.root,
        lineRange: flags.lines,
        excludePatterns: [...defaults.excludePatterns, ...flags.exclude],
        keepLogOnSuccess: flags.keepLog ?? defaults.keepLogOnSuccess,
        writeLog: flags.log && defaults.writeLog,
        dryRun: flags.dryRun ?? defaults.dryRun,
      };
      process.exitCode = runBuildCommand(options, container);
    });

  return program;
}

if (require.main === module) {
  createProgram().parse(process.argv);
}
