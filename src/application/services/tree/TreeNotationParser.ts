import { TreeNode } from "../../../domain/model/TreeNode";
import { ProgressReporter } from "../../ports/driven/ProgressReporter";
import { extractComment } from "../naming/CommentExtractor";
import { sanitizeName } from "../naming/NameSanitizer";
import { hasSeparator, splitSegments } from "../../../shared/utils/pathUtils";
import { splitLines } from "../../../shared/utils/textUtils";

// Sangría: espacios y glifos de caja; los conectores ASCII (`|-- `, `` `-- ``,
// `|`) y las viñetas (`- `) solo cuentan seguidos de espacio
const INDENT_PREFIX = /^(?:[\s│├└─]|[|`+]-{2,}\s|\|(?=\s)|[-+*]\s)+/;
const TRAILING_SEPARATOR = /[\\/]\s*$/;

interface StackEntry {
  indent: number;
  node: TreeNode;
}

type LineShape = "indented" | "shorthand";

/**
 * Convierte la notación de árbol (sangría, diagramas de caja o rutas
 * abreviadas como `src/app/main.ts`, mezcladas línea a línea) en un bosque
 * de nodos.
 */
export class TreeNotationParser {
  constructor(private readonly logger?: ProgressReporter) {}

  /**
   * @param start Primera línea de la región (base 0)
   * @param end Línea final exclusiva; sin ella, hasta el final del texto
   */
  parse(text: string, start: number = 0, end?: number): TreeNode[] {
    const forest: TreeNode[] = [];
    const stack: StackEntry[] = [];

    for (const line of splitLines(text).slice(start, end)) {
      const trimmed = line.trim();
      // Las líneas vacías y los delimitadores ``` no afectan a la pila
      if (!trimmed || trimmed.startsWith("```")) {
        continue;
      }

      const { content, indent } = splitIndent(line);
      if (!content.trim()) {
        continue;
      }

      const { name, comment } = extractComment(content.trim());
      if (!name) {
        continue;
      }

      if (classifyLine(name) === "shorthand") {
        this.parseShorthand(name, indent, comment, forest, stack);
      } else {
        this.parseIndented(name, indent, comment, forest, stack);
      }
    }

    this.logger?.debug(`TreeNotationParser: parsed ${forest.length} root node(s)`);
    return forest;
  }

  private parseIndented(
    rawName: string,
    indent: number,
    comment: string | undefined,
    forest: TreeNode[],
    stack: StackEntry[]
  ): void {
    const isExplicitDir = TRAILING_SEPARATOR.test(rawName);
    const name = sanitizeName(rawName);
    if (!name) {
      return;
    }

    const parent = resolveParent(stack, indent);
    const node = parent
      ? parent.ensureChild(name, !isExplicitDir, comment)
      : ensureRoot(forest, name, !isExplicitDir, comment);

    stack.push({ indent, node });
  }

  private parseShorthand(
    rawPath: string,
    indent: number,
    comment: string | undefined,
    forest: TreeNode[],
    stack: StackEntry[]
  ): void {
    const parts = splitSegments(rawPath)
      .map(sanitizeName)
      .filter((part) => part.length > 0);
    if (parts.length === 0) {
      return;
    }

    // `src/components/` describe un directorio, no un archivo
    const lastIsLeaf = !TRAILING_SEPARATOR.test(rawPath);
    const parent = resolveParent(stack, indent);

    const [first, ...rest] = parts;
    const single = rest.length === 0;
    const top = parent
      ? parent.ensureChild(first, single && lastIsLeaf, single ? comment : undefined)
      : ensureRoot(forest, first, single && lastIsLeaf, single ? comment : undefined);

    let current = top;
    for (let i = 0; i < rest.length; i++) {
      const isLast = i === rest.length - 1;
      current = current.ensureChild(
        rest[i],
        isLast && lastIsLeaf,
        isLast ? comment : undefined
      );
    }

    // Solo el primer segmento queda direccionable por sangría
    if (!parent) {
      stack.push({ indent, node: top });
    }
  }
}

/**
 * Separa la sangría (espacios y conectores) del contenido de la línea
 */
export function splitIndent(line: string): { content: string; indent: number } {
  const match = INDENT_PREFIX.exec(line);
  if (!match) {
    return { content: line, indent: 0 };
  }
  return { content: line.slice(match[0].length), indent: match[0].length };
}

export function classifyLine(name: string): LineShape {
  return hasSeparator(name) && splitSegments(name).length > 1
    ? "shorthand"
    : "indented";
}

/**
 * Desapila las entradas con sangría mayor o igual y devuelve el padre
 * vigente, si lo hay.
 */
function resolveParent(
  stack: StackEntry[],
  indent: number
): TreeNode | undefined {
  while (stack.length > 0 && stack[stack.length - 1].indent >= indent) {
    stack.pop();
  }
  return stack.length > 0 ? stack[stack.length - 1].node : undefined;
}

function ensureRoot(
  forest: TreeNode[],
  name: string,
  isLeaf: boolean,
  comment?: string
): TreeNode {
  const existing = forest.find((root) => root.name === name);
  if (existing) {
    existing.merge(isLeaf, comment);
    return existing;
  }
  const root = new TreeNode(name, isLeaf, comment);
  forest.push(root);
  return root;
}
