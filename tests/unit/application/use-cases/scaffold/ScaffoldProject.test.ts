import {
  SCAFFOLD_ERRORS,
  ScaffoldProject,
} from "../../../../../src/application/use-cases/scaffold/ScaffoldProject";
import { EMPTY_BUILD_STATS } from "../../../../../src/domain/model/BuildStats";
import { ScaffoldSuccess } from "../../../../../src/domain/model/ScaffoldResult";
import { ScaffoldInput } from "../../../../../src/domain/model/ScaffoldOptions";
import { InMemoryFileSystem } from "../../../../helpers/InMemoryFileSystem";
import { createMockReporter } from "../../../../helpers/mockReporter";

const DOCUMENT = [
  "# My App",
  "",
  "## Project Structure",
  "",
  "```",
  "my-app/",
  "├── src/",
  "│   └── main.py  # entry point",
  "└── README.md",
  "```",
  "",
  "**src/main.py**",
  "```python",
  'print("hello")',
  "```",
  "",
  "**README.md**",
  "```markdown",
  "# My App",
  "```",
].join("\n");

describe("ScaffoldProject", () => {
  let fs: InMemoryFileSystem;
  let logger: ReturnType<typeof createMockReporter>;
  let useCase: ScaffoldProject;

  beforeEach(() => {
    fs = new InMemoryFileSystem();
    logger = createMockReporter();
    useCase = new ScaffoldProject(fs, logger);
  });

  function expectSuccess(input: ScaffoldInput): ScaffoldSuccess {
    const result = useCase.execute(input);
    if (!result.ok) {
      throw new Error(`Expected success, got: ${result.error}`);
    }
    return result;
  }

  test("should build the tree and fill it from the code fences", () => {
    const result = expectSuccess({ text: DOCUMENT, rootPath: "/work" });

    expect(result.rootPath).toBe("/work/my-app");
    expect(result.fences.map((fence) => fence.filename)).toEqual([
      "src/main.py",
      "README.md",
    ]);
    expect(fs.list("/work")).toEqual([
      "/work/my-app/",
      "/work/my-app/README.md",
      "/work/my-app/src/",
      "/work/my-app/src/main.py",
    ]);
    expect(fs.contentOf("/work/my-app/src/main.py")).toBe(
      '# entry point\nprint("hello")'
    );
    expect(fs.contentOf("/work/my-app/README.md")).toBe("# My App");
    expect(result.stats).toEqual({
      dirsCreated: 2,
      filesCreated: 2,
      skipped: 0,
      excluded: 0,
      fencesFailed: 0,
    });
  });

  test("should skip what exists and write duplicates on a second run", () => {
    expectSuccess({ text: DOCUMENT, rootPath: "/work" });

    const second = expectSuccess({ text: DOCUMENT, rootPath: "/work" });

    expect(second.stats).toEqual({
      dirsCreated: 0,
      filesCreated: 2,
      skipped: 4,
      excluded: 0,
      fencesFailed: 0,
    });
    expect(fs.contentOf("/work/my-app/src/main (1).py")).toBe('print("hello")');
    expect(fs.contentOf("/work/my-app/README (1).md")).toBe("# My App");
  });

  test("should leave the prose after the next heading out of the tree", () => {
    const text = [
      "## Structure",
      "project/",
      "  a.py",
      "  b.py",
      "## Usage",
      "Run the thing.",
      "Then stop.",
    ].join("\n");

    const result = expectSuccess({ text, rootPath: "/work" });

    expect(result.forest.map((root) => root.name)).toEqual(["project"]);
    expect(result.rootPath).toBe("/work/project");
    expect(fs.list("/work")).toEqual([
      "/work/project/",
      "/work/project/a.py",
      "/work/project/b.py",
    ]);
  });

  test("should build several roots under the given directory", () => {
    const result = expectSuccess({ text: "a.txt\nb.txt", rootPath: "/work" });

    expect(result.rootPath).toBe("/work");
    expect(fs.list("/work")).toEqual(["/work/a.txt", "/work/b.txt"]);
    expect(result.stats.filesCreated).toBe(2);
  });

  test("should only plan on a dry run", () => {
    const result = expectSuccess({ text: DOCUMENT, rootPath: "/work", dryRun: true });

    expect(result.stats).toEqual(EMPTY_BUILD_STATS);
    expect(result.forest.map((root) => root.name)).toEqual(["my-app"]);
    expect(fs.exists("/work")).toBe(false);
  });

  test("should honour exclusion patterns in both passes", () => {
    const result = expectSuccess({
      text: DOCUMENT,
      rootPath: "/work",
      excludePatterns: ["*.md"],
    });

    expect(fs.exists("/work/my-app/README.md")).toBe(false);
    expect(result.stats).toMatchObject({ filesCreated: 1, excluded: 1 });
  });

  test("should reject an empty document", () => {
    const result = useCase.execute({ text: "   \n", rootPath: "/work" });

    expect(result).toEqual({
      ok: false,
      error: SCAFFOLD_ERRORS.NO_CONTENT,
      stats: EMPTY_BUILD_STATS,
    });
  });

  test("should reject a document without a usable tree", () => {
    const result = useCase.execute({ text: "🚀 ✨", rootPath: "/work" });

    expect(result).toEqual({
      ok: false,
      error: SCAFFOLD_ERRORS.NO_STRUCTURE,
      stats: EMPTY_BUILD_STATS,
    });
  });

  test("should report a failed build with its partial stats", () => {
    fs.seedFile("/work/my-app", "x");

    const result = useCase.execute({ text: DOCUMENT, rootPath: "/work" });

    expect(result).toEqual({
      ok: false,
      error: "Build root exists but is not a directory: /work/my-app",
      stats: { ...EMPTY_BUILD_STATS, skipped: 1 },
    });
    expect(logger.error).toHaveBeenCalledWith(
      "❌ Build failed: Build root exists but is not a directory: /work/my-app",
      expect.any(Error)
    );
    expect(logger.endOperation).toHaveBeenLastCalledWith("ScaffoldProject.execute");
  });
});
