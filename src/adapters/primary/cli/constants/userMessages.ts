import { BuildStats } from "../../../../domain/model/BuildStats";

export interface BuildSummary extends BuildStats {
  source: "document" | "selection";
  rootPath: string;
  fencesProcessed: number;
  logPath?: string;
}

const logLine = (logPath?: string) => (logPath ? `\nLog: ${logPath}` : "");

export const USER_MESSAGES = {
  ERRORS: {
    DOCUMENT_UNREADABLE: (documentPath: string, error: string) =>
      `Cannot read document ${documentPath}: ${error}`,
    BUILD_FAILED: (error: string, logPath?: string) =>
      `Build failed.\n\nError: ${error}${logLine(logPath)}`,
    INVALID_LINE_RANGE: (value: string) =>
      `Invalid line range "${value}". Use <start>-<end>, for example 12-40.`,
  },
  INFO: {
    BUILD_SUCCEEDED: (summary: BuildSummary) =>
      [
        "Built successfully!",
        "",
        `Source: ${summary.source}`,
        `Root: ${summary.rootPath}`,
        `Created ${summary.dirsCreated} directories`,
        `Created ${summary.filesCreated} files`,
        `Skipped ${summary.skipped} existing items`,
        `Processed ${summary.fencesProcessed} code blocks`,
      ].join("\n") + logLine(summary.logPath),
    DRY_RUN_PLAN: (rootPath: string, tree: string, fences: string[]) =>
      [
        `Dry run, nothing written. Root: ${rootPath}`,
        "",
        tree.trimEnd(),
        "",
        fences.length > 0
          ? `Code blocks:\n${fences.map((f) => `  ${f}`).join("\n")}`
          : "No named code blocks.",
      ].join("\n"),
  },
  WARNINGS: {
    EXCLUDED: (count: number) => `${count} path(s) excluded by pattern`,
    FENCES_FAILED: (count: number, logPath?: string) =>
      `${count} code block(s) could not be written${logLine(logPath)}`,
  },
} as const;
