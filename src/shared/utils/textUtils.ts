/** Parte un texto en líneas, aceptando finales \n y \r\n */
export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

export function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

/** Número de caracteres de espacio en blanco al inicio de la línea */
export function leadingWhitespace(line: string): number {
  return line.length - line.trimStart().length;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
