/**
 * Rango de líneas (base 1, ambos extremos incluidos) que actúa como selección
 */
export interface LineRange {
  start: number;
  end: number;
}

/**
 * Opciones de una invocación de construcción
 */
export interface ScaffoldOptions {
  /** Documento de origen */
  documentPath: string;

  /** Directorio de construcción; por defecto, el del documento */
  rootPath?: string;

  /** Selección de líneas; sin ella se usa el documento completo */
  lineRange?: LineRange;

  /** Patrones estilo .gitignore que no se deben crear */
  excludePatterns: string[];

  /** Conservar el log aunque la construcción no tenga errores */
  keepLogOnSuccess: boolean;

  /** Escribir el log de construcción */
  writeLog: boolean;

  /** Nombre del archivo de log, junto al documento */
  logFileName: string;

  /** Solo analizar y mostrar el plan */
  dryRun: boolean;

  verboseLogging: boolean;
}

/**
 * Entrada del caso de uso, ya resuelta por el adaptador primario
 */
export interface ScaffoldInput {
  text: string;
  rootPath: string;
  excludePatterns?: string[];
  dryRun?: boolean;
}
