import { ExclusionFilter } from "../../../../../src/application/services/filter/ExclusionFilter";

describe("ExclusionFilter", () => {
  const root = "/work/project";

  test("should exclude nothing without patterns", () => {
    const filter = new ExclusionFilter();

    expect(filter.isExcluded(root, `${root}/debug.log`, false)).toBe(false);
  });

  test("should match file globs relative to the root", () => {
    const filter = new ExclusionFilter(["*.log"]);

    expect(filter.isExcluded(root, `${root}/debug.log`, false)).toBe(true);
    expect(filter.isExcluded(root, `${root}/app.ts`, false)).toBe(false);
  });

  test("should apply directory-only patterns to directories", () => {
    const filter = new ExclusionFilter(["build/"]);

    expect(filter.isExcluded(root, `${root}/build`, true)).toBe(true);
    expect(filter.isExcluded(root, `${root}/build`, false)).toBe(false);
  });

  test("should honour negated patterns", () => {
    const filter = new ExclusionFilter(["*.md", "!README.md"]);

    expect(filter.isExcluded(root, `${root}/notes.md`, false)).toBe(true);
    expect(filter.isExcluded(root, `${root}/README.md`, false)).toBe(false);
  });

  test("should never exclude the root or paths outside it", () => {
    const filter = new ExclusionFilter(["*"]);

    expect(filter.isExcluded(root, root, true)).toBe(false);
    expect(filter.isExcluded(root, "/elsewhere/file.txt", false)).toBe(false);
  });
});
