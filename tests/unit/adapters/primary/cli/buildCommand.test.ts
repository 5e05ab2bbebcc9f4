import { runBuildCommand } from "../../../../../src/adapters/primary/cli/commands/buildCommand";
import { ScaffoldOptions } from "../../../../../src/domain/model/ScaffoldOptions";
import {
  createTestContainer,
  SAMPLE_DOCUMENT,
  TestContainer,
} from "../../../../helpers/testContainer";

describe("runBuildCommand", () => {
  let container: TestContainer;

  beforeEach(() => {
    container = createTestContainer();
    container.fsAdapter.seedFile("/docs/plan.md", SAMPLE_DOCUMENT);
  });

  function options(overrides: Partial<ScaffoldOptions> = {}): ScaffoldOptions {
    return { ...container.defaultOptions, documentPath: "/docs/plan.md", ...overrides };
  }

  test("should build next to the document and print a summary", () => {
    const code = runBuildCommand(options(), container);

    expect(code).toBe(0);
    expect(container.fsAdapter.contentOf("/docs/app/main.ts")).toBe("export {};");
    expect(container.notificationService.showInformation).toHaveBeenCalledWith(
      [
        "Built successfully!",
        "",
        "Source: document",
        "Root: /docs/app",
        "Created 1 directories",
        "Created 1 files",
        "Skipped 0 existing items",
        "Processed 1 code blocks",
      ].join("\n")
    );
    expect(container.fsAdapter.exists("/docs/docframe-build.log")).toBe(false);
  });

  test("should keep the build log when asked to", () => {
    runBuildCommand(options({ keepLogOnSuccess: true }), container);

    expect(container.fsAdapter.exists("/docs/docframe-build.log")).toBe(true);
    expect(container.notificationService.showInformation).toHaveBeenCalledWith(
      expect.stringMatching(/\nLog: \/docs\/docframe-build\.log$/)
    );
  });

  test("should build into an explicit root", () => {
    runBuildCommand(options({ rootPath: "/out" }), container);

    expect(container.fsAdapter.contentOf("/out/app/main.ts")).toBe("export {};");
  });

  test("should only use the selected lines", () => {
    runBuildCommand(options({ lineRange: { start: 1, end: 5 } }), container);

    expect(container.fsAdapter.contentOf("/docs/app/main.ts")).toBe("");
    expect(container.notificationService.showInformation).toHaveBeenCalledWith(
      expect.stringContaining("Source: selection\n")
    );
  });

  test("should print the plan on a dry run without writing", () => {
    const code = runBuildCommand(options({ dryRun: true }), container);

    expect(code).toBe(0);
    expect(container.fsAdapter.exists("/docs/app")).toBe(false);
    expect(container.notificationService.showInformation).toHaveBeenCalledWith(
      [
        "Dry run, nothing written. Root: /docs/app",
        "",
        "app/",
        "`-- main.ts",
        "",
        "Code blocks:",
        "  main.ts (line 7)",
      ].join("\n")
    );
  });

  test("should warn about excluded paths", () => {
    runBuildCommand(options({ excludePatterns: ["*.ts"] }), container);

    expect(container.fsAdapter.exists("/docs/app/main.ts")).toBe(false);
    expect(container.notificationService.showWarning).toHaveBeenCalledWith(
      "1 path(s) excluded by pattern"
    );
  });

  test("should report an unreadable document", () => {
    const code = runBuildCommand(options({ documentPath: "/missing.md" }), container);

    expect(code).toBe(1);
    expect(container.notificationService.showError).toHaveBeenCalledWith(
      "Cannot read document /missing.md: ENOENT: no such file or directory, open '/missing.md'"
    );
  });

  test("should report a failed build with its log", () => {
    container.fsAdapter.seedFile("/docs/empty.md", "   ");

    const code = runBuildCommand(options({ documentPath: "/docs/empty.md" }), container);

    expect(code).toBe(1);
    expect(container.notificationService.showError).toHaveBeenCalledWith(
      "Build failed.\n\nError: No content to build from.\nLog: /docs/docframe-build.log"
    );
    expect(container.fsAdapter.contentOf("/docs/docframe-build.log")).toContain(
      "ERROR: No content to build from."
    );
  });
});
