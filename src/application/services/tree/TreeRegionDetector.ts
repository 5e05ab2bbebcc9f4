import { isBlank, splitLines } from "../../../shared/utils/textUtils";

/**
 * Palabras clave de encabezado que anuncian un árbol de archivos
 */
export const STRUCTURE_KEYWORDS = [
  "structure",
  "file structure",
  "tree",
  "file tree",
  "directory structure",
  "folder structure",
  "project structure",
] as const;

const CONSECUTIVE_BLANKS_TO_END = 3;
const TREE_LINES_BEFORE_HEADING_ENDS = 3;

/**
 * Rango de líneas [start, end) que contiene el árbol; sin `end` llega hasta
 * el final del documento.
 */
export interface TreeRegion {
  start: number;
  end?: number;
}

/**
 * Localiza la región del documento que con más probabilidad contiene el
 * árbol.
 *
 * 1. Tras la primera línea con una palabra clave de estructura, la región
 *    empieza en la siguiente línea no vacía.
 * 2. Si no hay ninguna, empieza en la primera línea no vacía.
 */
export function findTreeRegion(text: string): TreeRegion {
  const lines = splitLines(text);

  for (let i = 0; i < lines.length; i++) {
    if (!mentionsStructure(lines[i])) {
      continue;
    }
    const start = firstNonBlank(lines, i + 1);
    if (start !== undefined) {
      return { start, end: findTreeEnd(lines, start) };
    }
  }

  const start = firstNonBlank(lines, 0);
  if (start === undefined) {
    return { start: 0 };
  }
  return { start, end: findTreeEnd(lines, start) };
}

export function mentionsStructure(line: string): boolean {
  const lower = line.trim().toLowerCase();
  return STRUCTURE_KEYWORDS.some((keyword) => lower.includes(keyword));
}

/**
 * Busca el final del árbol a partir de `start`. Termina en:
 * - un delimitador ``` sin sangría, si ya se ha visto alguna línea;
 * - la tercera línea vacía consecutiva;
 * - un encabezado markdown, si con él ya se han contado más de tres
 *   líneas.
 */
export function findTreeEnd(
  lines: readonly string[],
  start: number
): number | undefined {
  let treeLines = 0;
  let blankRun = 0;

  for (let i = start; i < lines.length; i++) {
    const line = lines[i];

    if (line.startsWith("```") && treeLines > 0) {
      return i;
    }

    if (isBlank(line)) {
      blankRun++;
      if (blankRun >= CONSECUTIVE_BLANKS_TO_END) {
        return i;
      }
      continue;
    }

    blankRun = 0;
    treeLines++;

    if (
      treeLines > TREE_LINES_BEFORE_HEADING_ENDS &&
      line.trim().startsWith("#")
    ) {
      return i;
    }
  }

  return undefined;
}

function firstNonBlank(
  lines: readonly string[],
  from: number
): number | undefined {
  for (let i = from; i < lines.length; i++) {
    if (!isBlank(lines[i])) {
      return i;
    }
  }
  return undefined;
}
