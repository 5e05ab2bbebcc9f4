import * as path from "path";
import { TreeNode } from "../../../../domain/model/TreeNode";

/**
 * Qué construir y dónde, tras decidir la raíz efectiva
 */
export interface BuildPlan {
  /** Raíz efectiva */
  rootPath: string;

  /** Nodos que se construyen directamente bajo la raíz efectiva */
  nodes: TreeNode[];

  /** Raíz única que ha pasado a ser la propia carpeta del proyecto */
  promotedRoot?: TreeNode;
}

/**
 * Con varias raíces se construye todo bajo `directory`. Con una sola, esa
 * raíz nombra la carpeta del proyecto y se construyen sus hijos dentro.
 */
export function resolveBuildRoot(
  forest: readonly TreeNode[],
  directory: string
): BuildPlan {
  if (forest.length !== 1) {
    return { rootPath: directory, nodes: [...forest] };
  }

  const [root] = forest;
  return {
    rootPath: path.join(directory, root.name),
    nodes: root.isLeaf ? [] : [...root.children],
    promotedRoot: root,
  };
}
