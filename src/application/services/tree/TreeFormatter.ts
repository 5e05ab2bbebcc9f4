import { TreeNode } from "../../../domain/model/TreeNode";

/**
 * Servicio para representar un bosque de nodos como árbol ASCII
 */
export class TreeFormatter {
  /**
   * Formatea el bosque en el orden en que se describió, una raíz por bloque
   * @param forest Raíces a formatear
   * @returns Representación de texto del bosque
   */
  formatForest(forest: readonly TreeNode[]): string {
    return forest
      .map((root) => `${this.label(root)}\n${this.formatNode(root, "")}`)
      .join("");
  }

  /**
   * Formatea los hijos de un nodo
   * @param node Nodo a formatear
   * @param prefix Prefijo para indentación
   */
  private formatNode(node: TreeNode, prefix: string): string {
    let result = "";

    node.children.forEach((child, i) => {
      const isLast = i === node.children.length - 1;
      const connector = isLast ? "`-- " : "|-- ";
      const nextPrefix = prefix + (isLast ? "    " : "|   ");

      result += `${prefix}${connector}${this.label(child)}\n`;
      result += this.formatNode(child, nextPrefix);
    });

    return result;
  }

  private label(node: TreeNode): string {
    const name = node.isLeaf ? node.name : `${node.name}/`;
    return node.comment ? `${name}  # ${node.comment}` : name;
  }
}
