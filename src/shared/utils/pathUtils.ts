import * as path from "path";

const SEPARATOR_PATTERN = /[\\/]/;

export function toPosix(relative: string): string {
  return relative.split(path.sep).join("/");
}

/** Ruta POSIX de `absolute` relativa a `root` */
export function rel(root: string, absolute: string): string {
  return toPosix(path.relative(root, absolute));
}

export function hasSeparator(value: string): boolean {
  return SEPARATOR_PATTERN.test(value);
}

/** Parte una ruta en segmentos no vacíos, aceptando `/` y `\` */
export function splitSegments(value: string): string[] {
  return value.split(/[\\/]+/).filter((segment) => segment.length > 0);
}

/** true si `target` queda fuera de `root` */
export function escapesRoot(root: string, target: string): boolean {
  const relative = path.relative(root, target);
  return relative.startsWith("..") || path.isAbsolute(relative);
}
