import { ProgressReporter } from "../../../application/ports/driven/ProgressReporter";

type Level = "INFO" | "WARN" | "ERROR" | "DEBUG";

/**
 * Implementación de ProgressReporter que usa console y puede añadir prefijos de nivel.
 */
export class ConsoleProgressReporter implements ProgressReporter {
  /**
   * @param verbose Si es true, muestra también info, debug y los tiempos de cada fase.
   * @param addLevelPrefixes Si es true, añade prefijos [INFO], [WARN], etc. a los mensajes.
   */
  constructor(
    private readonly verbose: boolean = false,
    private readonly addLevelPrefixes: boolean = false
  ) {}

  startOperation(label: string): void {
    if (this.verbose) {
      console.time(label);
    }
  }

  endOperation(label: string): void {
    if (this.verbose) {
      console.timeEnd(label);
    }
  }

  info(message: string): void {
    // Solo imprimir mensajes detallados si verbose está activado
    if (!this.verbose) {
      return;
    }
    console.log(this.format("INFO", message));
  }

  warn(message: string): void {
    console.warn(this.format("WARN", message));
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error && this.verbose) {
      console.error(this.format("ERROR", message), error);
      return;
    }
    console.error(this.format("ERROR", message));
  }

  debug(message: string, ...optionalParams: unknown[]): void {
    if (this.verbose) {
      console.debug(this.format("DEBUG", message), ...optionalParams);
    }
  }

  private format(level: Level, message: string): string {
    return this.addLevelPrefixes ? `[${level}] ${message}` : message;
  }
}
