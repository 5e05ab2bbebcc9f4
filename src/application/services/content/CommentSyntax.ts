import * as path from "path";

/**
 * Sintaxis de comentario de una línea para un tipo de archivo
 */
export interface CommentStyle {
  open: string;
  close?: string;
}

const HASH: CommentStyle = { open: "#" };
const SLASHES: CommentStyle = { open: "//" };
const MARKUP: CommentStyle = { open: "<!--", close: "-->" };
const BLOCK: CommentStyle = { open: "/*", close: "*/" };
const DASHES: CommentStyle = { open: "--" };

const STYLE_GROUPS: ReadonlyArray<[CommentStyle, string[]]> = [
  [HASH, [".py", ".rb", ".sh", ".bash", ".zsh", ".yml", ".yaml", ".toml", ".conf", ".r", ".pl"]],
  [
    SLASHES,
    [
      ".c", ".cpp", ".cc", ".h", ".hpp", ".java", ".js", ".mjs", ".cjs",
      ".ts", ".jsx", ".tsx", ".cs", ".go", ".rs", ".swift", ".kt",
      ".scala", ".php", ".dart",
    ],
  ],
  [MARKUP, [".html", ".htm", ".xml", ".svg", ".vue"]],
  [BLOCK, [".css", ".scss", ".sass", ".less"]],
  [DASHES, [".sql", ".lua", ".hs"]],
];

/**
 * Tabla extensión → sintaxis; las extensiones desconocidas usan `#`
 */
export const COMMENT_STYLES: ReadonlyMap<string, CommentStyle> = new Map(
  STYLE_GROUPS.flatMap(([style, extensions]) =>
    extensions.map((extension): [string, CommentStyle] => [extension, style])
  )
);

export function commentStyleFor(filePath: string): CommentStyle {
  return COMMENT_STYLES.get(path.extname(filePath).toLowerCase()) ?? HASH;
}

/**
 * Línea de comentario inicial de un archivo, sin salto de línea
 */
export function formatComment(filePath: string, comment: string): string {
  const style = commentStyleFor(filePath);
  return style.close
    ? `${style.open} ${comment} ${style.close}`
    : `${style.open} ${comment}`;
}
