/**
 * Nodo del árbol descrito en el documento: un archivo (hoja) o un directorio.
 *
 * Los hijos pertenecen al padre; `parent` es solo una referencia inversa
 * para reconstruir rutas.
 */
export class TreeNode {
  readonly children: TreeNode[] = [];
  parent?: TreeNode;

  constructor(
    readonly name: string,
    public isLeaf: boolean = true,
    public comment?: string
  ) {}

  /**
   * Busca un hijo directo por nombre
   */
  findChild(name: string): TreeNode | undefined {
    return this.children.find((child) => child.name === name);
  }

  /**
   * Devuelve el hijo con ese nombre o lo crea. Añadir un hijo convierte
   * siempre al nodo en directorio.
   */
  ensureChild(name: string, isLeaf: boolean, comment?: string): TreeNode {
    const existing = this.findChild(name);
    if (existing) {
      existing.merge(isLeaf, comment);
      return existing;
    }
    return this.addChild(new TreeNode(name, isLeaf, comment));
  }

  addChild(child: TreeNode): TreeNode {
    this.isLeaf = false;
    child.parent = this;
    this.children.push(child);
    return child;
  }

  /**
   * Aplica una segunda mención del mismo nodo: un directorio explícito gana
   * sobre una hoja y el comentario solo se rellena si faltaba.
   */
  merge(isLeaf: boolean, comment?: string): void {
    if (!isLeaf) {
      this.isLeaf = false;
    }
    if (comment && !this.comment) {
      this.comment = comment;
    }
  }

  /** Ruta POSIX desde la raíz más cercana del bosque */
  getPath(): string {
    return this.parent ? `${this.parent.getPath()}/${this.name}` : this.name;
  }
}
