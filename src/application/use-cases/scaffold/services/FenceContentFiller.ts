import * as path from "path";
import { Fence } from "../../../../domain/model/Fence";
import { TreeNode } from "../../../../domain/model/TreeNode";
import { FileSystemPort } from "../../../ports/driven/FileSystemPort";
import { ProgressReporter } from "../../../ports/driven/ProgressReporter";
import { formatComment } from "../../../services/content/CommentSyntax";
import { ExclusionFilter } from "../../../services/filter/ExclusionFilter";
import { sanitizeName } from "../../../services/naming/NameSanitizer";
import { splitSegments } from "../../../../shared/utils/pathUtils";
import { describeError } from "../../../../shared/utils/textUtils";
import { BuildLedger } from "./BuildLedger";
import { BuildPlan } from "./BuildRootResolver";

/**
 * Destino resuelto para el contenido de un bloque
 */
interface FenceTarget {
  fullPath: string;
  node?: TreeNode;
  how: "path" | "name" | "shorthand";
}

/**
 * Segunda pasada: vuelca el contenido de cada bloque de código en el
 * archivo que le corresponde.
 *
 * - Archivo inexistente: se crea (comentario del nodo + contenido).
 * - Vacío o solo con su comentario: se añade el contenido al final.
 * - Con otro contenido: se escribe en `nombre (N).ext`.
 *
 * Los fallos se aíslan por bloque.
 */
export class FenceContentFiller {
  constructor(
    private readonly fsPort: FileSystemPort,
    private readonly logger: ProgressReporter,
    private readonly exclusions: ExclusionFilter = new ExclusionFilter()
  ) {}

  /**
   * @returns Número de bloques procesados sin error
   */
  fill(fences: readonly Fence[], plan: BuildPlan, ledger: BuildLedger): number {
    this.logger.info(`FenceContentFiller: processing ${fences.length} fence(s)`);
    let processed = 0;

    for (const fence of fences) {
      try {
        this.fillOne(fence, plan, ledger);
        processed++;
      } catch (error) {
        ledger.fencesFailed++;
        this.logger.error(
          `Failed to process fence ${fence.filename} (line ${fence.line + 1}, ${fence.content.length} chars): ${describeError(error)}`,
          error
        );
      }
    }

    return processed;
  }

  private fillOne(fence: Fence, plan: BuildPlan, ledger: BuildLedger): void {
    const segments = this.relativeSegments(fence.filename, plan);
    const target = this.resolveTarget(segments, plan.rootPath, ledger);

    if (this.exclusions.isExcluded(plan.rootPath, target.fullPath, false)) {
      ledger.excluded.add(target.fullPath);
      this.logger.info(`Fence ${fence.filename} targets an excluded path, skipping`);
      return;
    }

    this.logger.info(
      target.how === "shorthand"
        ? `Not in tree, creating as shorthand: ${target.fullPath}`
        : `Matched ${fence.filename} to ${target.fullPath} (by ${target.how})`
    );
    this.writeContent(target, fence.content, ledger);
    ledger.register(target.fullPath, target.node);
  }

  /**
   * Normaliza el nombre del bloque a segmentos relativos a la raíz efectiva.
   * Si se promovió una raíz única, su nombre como primer segmento se omite.
   */
  private relativeSegments(filename: string, plan: BuildPlan): string[] {
    const raw = splitSegments(filename).filter((segment) => segment !== ".");
    if (raw.includes("..")) {
      throw new Error(`Fence path escapes the build root: ${filename}`);
    }

    let segments = raw.map(sanitizeName).filter((segment) => segment.length > 0);
    if (
      plan.promotedRoot &&
      segments.length > 1 &&
      segments[0] === plan.promotedRoot.name
    ) {
      segments = segments.slice(1);
    }

    if (segments.length === 0) {
      throw new Error(`Fence filename has no usable path: ${filename}`);
    }
    return segments;
  }

  private resolveTarget(
    segments: string[],
    rootPath: string,
    ledger: BuildLedger
  ): FenceTarget {
    const candidate = path.join(rootPath, ...segments);

    if (segments.length > 1) {
      if (ledger.isKnown(candidate)) {
        return { fullPath: candidate, node: ledger.nodeAt(candidate), how: "path" };
      }
    } else {
      // Primera coincidencia en orden de construcción
      const match = ledger
        .knownFiles()
        .find((known) => path.basename(known) === segments[0]);
      if (match !== undefined) {
        return { fullPath: match, node: ledger.nodeAt(match), how: "name" };
      }
    }

    return { fullPath: candidate, how: "shorthand" };
  }

  private writeContent(target: FenceTarget, content: string, ledger: BuildLedger): void {
    const { fullPath, node } = target;
    const commentLine = node?.comment
      ? formatComment(fullPath, node.comment)
      : undefined;

    if (!this.fsPort.exists(fullPath)) {
      this.fsPort.makeDirectories(path.dirname(fullPath));
      const header = commentLine !== undefined ? `${commentLine}\n` : "";
      this.fsPort.writeFile(fullPath, header + content, "overwrite");
      ledger.filesCreated.add(fullPath);
      this.logger.info(`Created new file with content: ${fullPath}`);
      return;
    }

    if (this.fsPort.isDirectory(fullPath)) {
      throw new Error(`Fence target is a directory: ${fullPath}`);
    }

    const existing = this.fsPort.readFile(fullPath);
    const isCommentOnly =
      commentLine !== undefined && existing.trim() === commentLine.trim();

    if (!existing.trim() || isCommentOnly) {
      const separator = existing && !existing.endsWith("\n") ? "\n" : "";
      this.fsPort.writeFile(fullPath, separator + content, "append");
      this.logger.info(`Appended content to: ${fullPath}`);
      return;
    }

    const duplicatePath = this.nextDuplicatePath(fullPath);
    this.fsPort.writeFile(duplicatePath, content, "overwrite");
    ledger.filesCreated.add(duplicatePath);
    this.logger.warn(`File had content, created duplicate: ${duplicatePath}`);
  }

  /**
   * `nombre (N).ext` con el primer N libre
   */
  private nextDuplicatePath(fullPath: string): string {
    const directory = path.dirname(fullPath);
    const extension = path.extname(fullPath);
    const stem = path.basename(fullPath, extension);

    for (let counter = 1; ; counter++) {
      const candidate = path.join(directory, `${stem} (${counter})${extension}`);
      if (!this.fsPort.exists(candidate)) {
        return candidate;
      }
    }
  }
}
