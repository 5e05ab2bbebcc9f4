import { CodeFenceScanner } from "../../../../../src/application/services/fence/CodeFenceScanner";
import { createMockReporter } from "../../../../helpers/mockReporter";

describe("CodeFenceScanner", () => {
  let scanner: CodeFenceScanner;

  beforeEach(() => {
    scanner = new CodeFenceScanner();
  });

  test("should skip a fence that only carries a language tag", () => {
    const logger = createMockReporter();
    const text = ["Intro", "```python", 'print("hi")', "```"].join("\n");

    expect(new CodeFenceScanner(logger).scan(text)).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      "Fence at line 2 has no filename, skipping"
    );
  });

  test("should take the filename from the line before the fence", () => {
    const text = ["**main.py**", "```python", 'print("hi")', "```"].join("\n");

    expect(scanner.scan(text)).toEqual([
      { filename: "main.py", content: 'print("hi")', line: 1 },
    ]);
  });

  test("should read a filename from a markdown heading before the fence", () => {
    const text = ["## notes.md", "```", "remember", "```"].join("\n");

    expect(scanner.scan(text)).toEqual([
      { filename: "notes.md", content: "remember", line: 1 },
    ]);
  });

  test("should take the filename from the opening line", () => {
    const text = ["```src/app.ts", "export {};", "```"].join("\n");

    expect(scanner.scan(text)).toEqual([
      { filename: "src/app.ts", content: "export {};", line: 0 },
    ]);
  });

  test("should take the filename from a leading comment and drop that line", () => {
    const text = ["```ts", "// utils.ts", "export const x = 1;", "```"].join("\n");

    expect(scanner.scan(text)).toEqual([
      { filename: "utils.ts", content: "export const x = 1;", line: 0 },
    ]);
  });

  test("should prefer the line before the fence over a leading comment", () => {
    const text = ["main.py", "```python", "# other.py", "x = 1", "```"].join("\n");

    expect(scanner.scan(text)).toEqual([
      { filename: "main.py", content: "# other.py\nx = 1", line: 1 },
    ]);
  });

  test("should keep nested fences inside the outer block", () => {
    const text = [
      "README.md",
      "```markdown",
      "# Title",
      "```bash",
      "npm install",
      "```",
      "Done",
      "```",
    ].join("\n");

    expect(scanner.scan(text)).toEqual([
      {
        filename: "README.md",
        content: "# Title\n```bash\nnpm install\n```\nDone",
        line: 1,
      },
    ]);
  });

  test("should not open a block on an indented fence", () => {
    const text = ["notes.txt", "  ```js", "  x", "  ```"].join("\n");

    expect(scanner.scan(text)).toEqual([]);
  });

  test("should accept extensionless filenames", () => {
    const text = ["Makefile", "```", "all:", "\techo hi", "```"].join("\n");

    expect(scanner.scan(text)).toEqual([
      { filename: "Makefile", content: "all:\n\techo hi", line: 1 },
    ]);
  });

  test("should read an unclosed fence to the end of the document", () => {
    const text = ["a.txt", "```", "hello"].join("\n");

    expect(scanner.scan(text)).toEqual([
      { filename: "a.txt", content: "hello", line: 1 },
    ]);
  });

  test("should not read a closing delimiter as the next filename", () => {
    const text = ["a.txt", "```", "A", "```", "```", "B", "```"].join("\n");

    expect(scanner.scan(text)).toEqual([
      { filename: "a.txt", content: "A", line: 1 },
    ]);
  });

  test("should report the number of named fences", () => {
    const logger = createMockReporter();
    const text = ["a.txt", "```", "A", "```", "", "b.txt", "```", "B", "```"].join("\n");

    const fences = new CodeFenceScanner(logger).scan(text);

    expect(fences.map((fence) => fence.filename)).toEqual(["a.txt", "b.txt"]);
    expect(logger.info).toHaveBeenLastCalledWith(
      "CodeFenceScanner: 2 named fence(s) detected"
    );
  });
});
