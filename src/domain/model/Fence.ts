/**
 * Bloque de código delimitado por ``` a nivel raíz del documento, con el
 * nombre de archivo que se le ha inferido.
 */
export interface Fence {
  /** Nombre o ruta inferida */
  readonly filename: string;

  /** Cuerpo literal, sin las líneas delimitadoras */
  readonly content: string;

  /** Índice (base 0) de la línea de apertura */
  readonly line: number;
}
