import { extractComment } from "../naming/CommentExtractor";

/**
 * Nombres de archivo habituales que no llevan extensión
 */
export const EXTENSIONLESS_FILENAMES: readonly string[] = [
  "Makefile",
  "Dockerfile",
  "LICENSE",
  "README",
  "CHANGELOG",
  "CONTRIBUTING",
  "AUTHORS",
  "INSTALL",
  "Gemfile",
  "Rakefile",
];

/** Prefijos de una primera línea que nombra su propio archivo */
const COMMENT_LINE_PREFIXES = ["///", "//", "#", "<!--", "<--", "/*", "--"];

const MAX_FILENAME_LENGTH = 200;

/**
 * Extrae un nombre de archivo de un texto libre (negritas, comillas
 * invertidas, encabezados markdown o dos puntos finales).
 * @returns El nombre, o undefined si el texto no parece un archivo
 */
export function extractFilename(text: string): string | undefined {
  let candidate = text.trim();

  const firstTick = candidate.indexOf("`");
  const lastTick = candidate.lastIndexOf("`");
  if (firstTick !== -1 && firstTick < lastTick) {
    candidate = candidate.slice(firstTick + 1, lastTick);
  }

  candidate = candidate
    .replace(/^\*+|\*+$/g, "")
    .trim()
    .replace(/^#{1,6}\s+/, "")
    .replace(/:$/, "")
    .trim();

  return isValidFilename(candidate) ? candidate : undefined;
}

/**
 * Un nombre válido está en la lista sin extensión, o contiene un punto y es
 * una ruta o una sola palabra.
 */
export function isValidFilename(candidate: string): boolean {
  if (EXTENSIONLESS_FILENAMES.includes(candidate)) {
    return true;
  }
  if (!candidate.includes(".") || candidate.length >= MAX_FILENAME_LENGTH) {
    return false;
  }
  const isPathLike = /[\\/]/.test(candidate);
  const isSingleToken = candidate.split(/\s+/).length === 1;
  return isPathLike || isSingleToken;
}

/**
 * Una etiqueta de lenguaje (`python`, `bash`) es puramente alfabética
 */
export function isLanguageTag(tag: string): boolean {
  return /^\p{L}+$/u.test(tag);
}

/**
 * Nombre en la línea anterior al bloque
 */
export function filenameBeforeFence(previousLine: string): string | undefined {
  const trimmed = previousLine.trim();
  if (!trimmed || trimmed.startsWith("```")) {
    return undefined;
  }
  return extractFilename(trimmed);
}

/**
 * Nombre en la propia línea de apertura, tras las comillas invertidas
 */
export function filenameOnFence(openingLine: string): string | undefined {
  const info = openingLine.trim().slice(3);
  if (!info || isLanguageTag(info)) {
    return undefined;
  }
  return extractFilename(info);
}

/**
 * Nombre en un comentario de la primera línea del bloque (`// utils.ts`)
 */
export function filenameFromCommentLine(line: string): string | undefined {
  const trimmed = line.trim();
  const prefix = COMMENT_LINE_PREFIXES.find((p) => trimmed.startsWith(p));
  if (prefix === undefined) {
    return undefined;
  }

  const remainder = trimmed
    .slice(prefix.length)
    .replace(/\s*(-->|\*\/)\s*$/, "")
    .trim();
  const { name } = extractComment(remainder);
  return extractFilename(name);
}
