import ignore from "ignore";
import type { Ignore } from "ignore";
import { escapesRoot, rel } from "../../../shared/utils/pathUtils";

/**
 * Filtra las rutas que no se deben crear, con patrones estilo .gitignore
 * relativos a la raíz efectiva
 */
export class ExclusionFilter {
  private readonly ig: Ignore;
  private readonly active: boolean;

  constructor(patterns: readonly string[] = []) {
    this.ig = ignore().add([...patterns]);
    this.active = patterns.length > 0;
  }

  /**
   * @param rootPath Raíz efectiva de la construcción
   * @param targetPath Ruta absoluta candidata
   * @param isDirectory Los directorios se comprueban con `/` final
   */
  isExcluded(rootPath: string, targetPath: string, isDirectory: boolean): boolean {
    if (!this.active || escapesRoot(rootPath, targetPath)) {
      return false;
    }
    const relative = rel(rootPath, targetPath);
    if (!relative) {
      return false;
    }
    return this.ig.ignores(isDirectory ? `${relative}/` : relative);
  }
}
