import { BuildStats } from "./BuildStats";
import { Fence } from "./Fence";
import { TreeNode } from "./TreeNode";

/**
 * Resultado de una construcción correcta
 */
export interface ScaffoldSuccess {
  ok: true;
  stats: BuildStats;

  /** Raíz efectiva tras la promoción de raíz única */
  rootPath: string;

  /** Bosque analizado */
  forest: TreeNode[];

  /** Bloques de código con nombre detectados */
  fences: Fence[];
}

/**
 * Resultado de una construcción fallida, con las estadísticas parciales
 */
export interface ScaffoldFailure {
  ok: false;
  error: string;
  stats: BuildStats;
}

export type ScaffoldResult = ScaffoldSuccess | ScaffoldFailure;
