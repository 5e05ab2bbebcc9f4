export type WriteMode = "overwrite" | "append";

/**
 * Puerto secundario para interactuar con el sistema de archivos.
 *
 * Es síncrono: una construcción se ejecuta de principio a fin sin puntos de
 * suspensión. Los errores de E/S se propagan como excepciones.
 */
export interface FileSystemPort {
  exists(path: string): boolean;

  /**
   * Indica si la ruta existe y es un directorio
   */
  isDirectory(path: string): boolean;

  /**
   * Crea el directorio y todos sus ancestros que falten
   */
  makeDirectories(path: string): void;

  readFile(path: string): string;

  /**
   * Escribe (o añade al final de) un archivo cuyo directorio ya existe
   * @param mode "overwrite" reemplaza el contenido, "append" lo añade al final
   */
  writeFile(path: string, content: string, mode: WriteMode): void;
}
