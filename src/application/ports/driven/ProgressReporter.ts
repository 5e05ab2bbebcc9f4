/**
 * Interfaz para reportar el progreso de una construcción
 */
export interface ProgressReporter {
  /**
   * Inicia una fase con temporizador
   * @param label Etiqueta para identificar la fase
   */
  startOperation(label: string): void;

  /**
   * Finaliza una fase con temporizador
   * @param label Etiqueta para identificar la fase
   */
  endOperation(label: string): void;

  info(message: string): void;
  warn(message: string): void;

  /**
   * Reporta un mensaje de error
   * @param message Mensaje de error
   * @param error Objeto de error opcional
   */
  error(message: string, error?: unknown): void;

  debug(message: string, ...optionalParams: unknown[]): void;
}
