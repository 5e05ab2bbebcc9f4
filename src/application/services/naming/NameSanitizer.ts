/**
 * Glifos de dibujo de cajas que aparecen en los diagramas de árbol
 */
export const BOX_DRAWING_CHARS = "│├└─┌┐┘┤┬┴┼═║╔╗╚╝╠╣╦╩╬";

const EMOJI_PATTERN = new RegExp(
  [
    "[",
    "\\u{1F600}-\\u{1F64F}", // emoticonos
    "\\u{1F300}-\\u{1F5FF}", // símbolos y pictogramas
    "\\u{1F680}-\\u{1F6FF}", // transporte y mapas
    "\\u{1F1E0}-\\u{1F1FF}", // banderas
    "\\u{1F900}-\\u{1F9FF}",
    "\\u{1FA00}-\\u{1FAFF}",
    "\\u{2600}-\\u{26FF}", // símbolos misceláneos
    "\\u{2700}-\\u{27BF}", // dingbats
    "\\u{FE0F}\\u{200D}",
    "]+",
  ].join(""),
  "gu"
);

const BOX_DRAWING_PATTERN = new RegExp(`[${BOX_DRAWING_CHARS}]`, "g");

// Paréntesis y corchetes se permiten: app/(dashboard)/, [id]/
const INCOMPATIBLE_PATTERN = /[<>:"|?*]/g;

const SEPARATOR_PATTERN = /[\\/]/g;

const CONTROL_PATTERN = /[\u0000-\u001F\u007F]/g;

/**
 * Limpia un único segmento de ruta para que sea un nombre válido en
 * cualquier sistema de archivos.
 *
 * Una cadena vacía significa "sin nombre utilizable".
 */
export function sanitizeName(raw: string): string {
  return raw
    .replace(EMOJI_PATTERN, "")
    .replace(BOX_DRAWING_PATTERN, "")
    .replace(INCOMPATIBLE_PATTERN, "")
    .replace(SEPARATOR_PATTERN, "")
    .replace(CONTROL_PATTERN, "")
    .replace(/\s+/g, " ")
    .trim();
}
