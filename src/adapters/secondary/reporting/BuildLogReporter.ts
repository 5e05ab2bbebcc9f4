import { FileSystemPort } from "../../../application/ports/driven/FileSystemPort";
import { ProgressReporter } from "../../../application/ports/driven/ProgressReporter";
import { describeError } from "../../../shared/utils/textUtils";

const RULE = "=".repeat(70);
const SECTION_RULE = "-".repeat(70);

export interface BuildLogOptions {
  /** Archivo donde se vuelca el log */
  logPath: string;

  /** Directorio de construcción, para la cabecera */
  rootPath: string;

  /** Conservar el log aunque no haya errores */
  keepLogOnSuccess: boolean;

  /** Reporter al que se reenvía cada entrada (p. ej. la consola) */
  forward?: ProgressReporter;

  clock?: () => Date;
}

/**
 * Log de construcción: entradas con marca de tiempo, agrupadas en secciones,
 * que se escriben de una vez al finalizar.
 */
export class BuildLogReporter implements ProgressReporter {
  private readonly entries: string[] = [];
  private readonly startedAt: Date;
  private readonly clock: () => Date;
  private readonly operationStarts = new Map<string, number>();
  private errors = 0;

  constructor(
    private readonly fsPort: FileSystemPort,
    private readonly options: BuildLogOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.startedAt = this.clock();
    this.entries.push(
      RULE,
      "Build Log",
      RULE,
      `Started: ${formatDateTime(this.startedAt)}`,
      `Root Path: ${options.rootPath}`,
      `Keep Log On Success: ${options.keepLogOnSuccess}`,
      RULE,
      ""
    );
  }

  get hasErrors(): boolean {
    return this.errors > 0;
  }

  startOperation(label: string): void {
    this.operationStarts.set(label, this.clock().getTime());
    this.entries.push("", SECTION_RULE, `  ${label}`, SECTION_RULE);
    this.options.forward?.startOperation(label);
  }

  endOperation(label: string): void {
    const startedAt = this.operationStarts.get(label);
    if (startedAt !== undefined) {
      this.operationStarts.delete(label);
      this.entries.push(`  (${label}: ${this.clock().getTime() - startedAt} ms)`);
    }
    this.options.forward?.endOperation(label);
  }

  info(message: string): void {
    this.append("INFO", message);
    this.options.forward?.info(message);
  }

  warn(message: string): void {
    this.append("WARNING", message);
    this.options.forward?.warn(message);
  }

  error(message: string, error?: unknown): void {
    this.errors++;
    this.append("ERROR", message);
    if (error !== undefined) {
      const name = error instanceof Error ? error.name : typeof error;
      this.entries.push(`  Exception: ${name}: ${describeError(error)}`);
      if (error instanceof Error && error.stack) {
        this.entries.push("  Traceback:");
        for (const line of error.stack.split("\n").slice(1)) {
          if (line.trim()) {
            this.entries.push(`    ${line.trim()}`);
          }
        }
      }
    }
    this.options.forward?.error(message, error);
  }

  debug(message: string, ...optionalParams: unknown[]): void {
    this.append("DEBUG", message);
    this.options.forward?.debug(message, ...optionalParams);
  }

  /** Texto completo del log, sin pie */
  toString(): string {
    return this.entries.join("\n");
  }

  /**
   * Cierra el log y lo escribe si hay errores o si se pidió conservarlo.
   * Un fallo al escribirlo nunca interrumpe la construcción.
   * @returns Ruta del log conservado, o undefined si no se conserva
   */
  finalize(): string | undefined {
    const finishedAt = this.clock();
    const seconds = (finishedAt.getTime() - this.startedAt.getTime()) / 1000;
    this.entries.push(
      "",
      RULE,
      `Completed: ${formatDateTime(finishedAt)}`,
      `Duration: ${seconds.toFixed(2)} seconds`,
      `Status: ${this.hasErrors ? "FAILED" : "SUCCESS"}`,
      RULE
    );

    if (!this.hasErrors && !this.options.keepLogOnSuccess) {
      return undefined;
    }

    try {
      this.fsPort.writeFile(this.options.logPath, `${this.toString()}\n`, "overwrite");
      return this.options.logPath;
    } catch (err) {
      console.error(`Failed to write build log ${this.options.logPath}: ${describeError(err)}`);
      return undefined;
    }
  }

  private append(level: string, message: string): void {
    this.entries.push(`[${formatTime(this.clock())}] ${level}: ${message}`);
  }
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, "0");
}

function formatTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
}

function formatDateTime(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
