/**
 * Marcadores de comentario reconocidos al final de una línea del árbol
 */
export const COMMENT_MARKERS = ["<!--", "<--", "//", "/*", "#"] as const;

export interface ExtractedComment {
  name: string;
  comment?: string;
}

/**
 * Separa una línea en nombre y comentario.
 *
 * Gana el marcador que aparece antes en la línea, no el primero de la
 * lista. Los cierres `-->` y `*\/` se quedan en el comentario tal cual.
 */
export function extractComment(line: string): ExtractedComment {
  let markerIndex = -1;
  let marker: string | undefined;

  for (const candidate of COMMENT_MARKERS) {
    const index = line.indexOf(candidate);
    if (index !== -1 && (markerIndex === -1 || index < markerIndex)) {
      markerIndex = index;
      marker = candidate;
    }
  }

  if (marker === undefined) {
    return { name: line.trim() };
  }

  const name = line.slice(0, markerIndex).trimEnd();
  const comment = line.slice(markerIndex + marker.length).trim();
  return comment ? { name, comment } : { name };
}
