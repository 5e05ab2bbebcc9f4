import { BuildStats } from "../../../../domain/model/BuildStats";
import { TreeNode } from "../../../../domain/model/TreeNode";

/**
 * Registro mutable de una construcción: qué se creó, qué se saltó y qué
 * rutas conoce el relleno de contenido.
 */
export class BuildLedger {
  readonly dirsCreated = new Set<string>();
  readonly filesCreated = new Set<string>();
  readonly skipped = new Set<string>();
  readonly excluded = new Set<string>();
  fencesFailed = 0;

  // Map conserva el orden de inserción: el orden de construcción
  private readonly known = new Map<string, TreeNode | undefined>();

  /**
   * Registra una ruta conocida; `node` falta en los archivos creados desde
   * un bloque de código sin nodo en el árbol
   */
  register(fullPath: string, node?: TreeNode): void {
    if (!this.known.has(fullPath)) {
      this.known.set(fullPath, node);
    }
  }

  isKnown(fullPath: string): boolean {
    return this.known.has(fullPath);
  }

  nodeAt(fullPath: string): TreeNode | undefined {
    return this.known.get(fullPath);
  }

  /**
   * Rutas de archivo conocidas, en orden de construcción
   */
  knownFiles(): string[] {
    return [...this.known.entries()]
      .filter(([, node]) => node === undefined || node.isLeaf)
      .map(([fullPath]) => fullPath);
  }

  toStats(): BuildStats {
    return {
      dirsCreated: this.dirsCreated.size,
      filesCreated: this.filesCreated.size,
      skipped: this.skipped.size,
      excluded: this.excluded.size,
      fencesFailed: this.fencesFailed,
    };
  }
}
