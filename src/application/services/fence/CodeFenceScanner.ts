import { Fence } from "../../../domain/model/Fence";
import { ProgressReporter } from "../../ports/driven/ProgressReporter";
import { leadingWhitespace, splitLines } from "../../../shared/utils/textUtils";
import {
  filenameBeforeFence,
  filenameFromCommentLine,
  filenameOnFence,
} from "./FilenameInference";

const FENCE = "```";

type FilenameSource = "pre-fence" | "on-fence" | "post-fence";

interface FenceBody {
  lines: string[];
  /** Índice de la línea de cierre, o lines.length si no se cerró */
  closedAt: number;
}

/**
 * Localiza los bloques de código a nivel raíz del documento y les infiere
 * un nombre de archivo. Los bloques anidados o con sangría forman parte del
 * contenido del bloque que los contiene.
 */
export class CodeFenceScanner {
  constructor(private readonly logger?: ProgressReporter) {}

  scan(text: string): Fence[] {
    const lines = splitLines(text);
    const fences: Fence[] = [];

    let i = 0;
    while (i < lines.length) {
      if (!lines[i].startsWith(FENCE)) {
        i++;
        continue;
      }

      const opening = i;
      let filename: string | undefined;
      let source: FilenameSource | undefined;

      if (opening > 0) {
        filename = filenameBeforeFence(lines[opening - 1]);
        source = filename ? "pre-fence" : undefined;
      }
      if (!filename) {
        filename = filenameOnFence(lines[opening]);
        source = filename ? "on-fence" : undefined;
      }

      const body = readBody(lines, opening + 1);
      let contentLines = body.lines;

      if (!filename && contentLines.length > 0) {
        filename = filenameFromCommentLine(contentLines[0]);
        if (filename) {
          source = "post-fence";
          contentLines = contentLines.slice(1);
        }
      }

      if (filename) {
        const content = contentLines.join("\n");
        fences.push({ filename, content, line: opening });
        this.logger?.info(
          `Fence at line ${opening + 1}: ${filename} (${source}, ${content.length} chars)`
        );
      } else {
        this.logger?.warn(
          `Fence at line ${opening + 1} has no filename, skipping`
        );
      }

      i = body.closedAt + 1;
    }

    this.logger?.info(`CodeFenceScanner: ${fences.length} named fence(s) detected`);
    return fences;
  }
}

/**
 * Acumula el cuerpo hasta el cierre propio del bloque.
 *
 * Una línea ``` con etiqueta o con sangría abre un bloque anidado; una
 * línea ``` sin etiqueta ni sangría cierra el anidado más interno, o el
 * bloque exterior si no queda ninguno abierto.
 */
function readBody(lines: readonly string[], from: number): FenceBody {
  const body: string[] = [];
  let depth = 0;

  for (let i = from; i < lines.length; i++) {
    const line = lines[i];
    const trimmed = line.trim();

    if (!trimmed.startsWith(FENCE)) {
      body.push(line);
      continue;
    }

    const tag = trimmed.slice(FENCE.length).trim();
    const isIndented = leadingWhitespace(line) > 0;

    if (tag !== "" || isIndented) {
      depth++;
    } else if (depth > 0) {
      depth--;
    } else {
      return { lines: body, closedAt: i };
    }
    body.push(line);
  }

  return { lines: body, closedAt: lines.length };
}
