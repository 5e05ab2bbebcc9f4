import * as path from "path";
import { TreeNode } from "../../../../domain/model/TreeNode";
import { FileSystemPort } from "../../../ports/driven/FileSystemPort";
import { ProgressReporter } from "../../../ports/driven/ProgressReporter";
import { formatComment } from "../../../services/content/CommentSyntax";
import { ExclusionFilter } from "../../../services/filter/ExclusionFilter";
import { BuildLedger } from "./BuildLedger";
import { BuildPlan } from "./BuildRootResolver";

/**
 * Primera pasada: crea en disco los directorios y archivos del bosque.
 *
 * Nunca sobrescribe: lo que ya existe se registra como saltado. Los fallos
 * de E/S se propagan y abortan la construcción.
 */
export class TreeBuilder {
  constructor(
    private readonly fsPort: FileSystemPort,
    private readonly logger: ProgressReporter,
    private readonly exclusions: ExclusionFilter = new ExclusionFilter()
  ) {}

  build(plan: BuildPlan, ledger: BuildLedger): void {
    this.logger.info(`TreeBuilder: processing ${plan.nodes.length} node(s) under ${plan.rootPath}`);

    if (plan.promotedRoot && !plan.promotedRoot.isLeaf) {
      this.ensureRoot(plan.rootPath, ledger);
    }

    for (const node of plan.nodes) {
      this.buildNode(node, plan.rootPath, plan.rootPath, ledger);
    }

    this.logger.info(
      `TreeBuilder: created ${ledger.dirsCreated.size} dir(s), ${ledger.filesCreated.size} file(s), skipped ${ledger.skipped.size}`
    );
  }

  private ensureRoot(rootPath: string, ledger: BuildLedger): void {
    if (!this.fsPort.exists(rootPath)) {
      this.fsPort.makeDirectories(rootPath);
      ledger.dirsCreated.add(rootPath);
      this.logger.info(`Created directory: ${rootPath}`);
      return;
    }
    if (!this.fsPort.isDirectory(rootPath)) {
      ledger.skipped.add(rootPath);
      throw new Error(`Build root exists but is not a directory: ${rootPath}`);
    }
    ledger.skipped.add(rootPath);
    this.logger.info(`Skipped existing directory: ${rootPath}`);
  }

  private buildNode(
    node: TreeNode,
    parentPath: string,
    rootPath: string,
    ledger: BuildLedger
  ): void {
    const fullPath = path.join(parentPath, node.name);

    if (this.exclusions.isExcluded(rootPath, fullPath, !node.isLeaf)) {
      ledger.excluded.add(fullPath);
      this.logger.info(`Excluded by pattern: ${fullPath}`);
      return;
    }

    ledger.register(fullPath, node);

    if (node.isLeaf) {
      this.buildFile(node, fullPath, ledger);
      return;
    }

    if (this.fsPort.exists(fullPath)) {
      ledger.skipped.add(fullPath);
      if (!this.fsPort.isDirectory(fullPath)) {
        this.logger.warn(`Path exists but is not a directory: ${fullPath}`);
        return;
      }
      this.logger.info(`Skipped existing directory: ${fullPath}`);
    } else {
      this.create(fullPath, () => this.fsPort.makeDirectories(fullPath));
      ledger.dirsCreated.add(fullPath);
      this.logger.info(`Created directory: ${fullPath}`);
    }

    for (const child of node.children) {
      this.buildNode(child, fullPath, rootPath, ledger);
    }
  }

  private buildFile(node: TreeNode, fullPath: string, ledger: BuildLedger): void {
    if (this.fsPort.exists(fullPath)) {
      ledger.skipped.add(fullPath);
      this.logger.info(`Skipped existing file: ${fullPath}`);
      return;
    }

    const initialContent = node.comment
      ? `${formatComment(fullPath, node.comment)}\n`
      : "";
    this.create(fullPath, () => {
      this.fsPort.makeDirectories(path.dirname(fullPath));
      this.fsPort.writeFile(fullPath, initialContent, "overwrite");
    });
    ledger.filesCreated.add(fullPath);
    this.logger.info(
      node.comment
        ? `Created file: ${fullPath} (with comment)`
        : `Created file: ${fullPath}`
    );
  }

  private create(fullPath: string, action: () => void): void {
    try {
      action();
    } catch (error) {
      this.logger.error(`Failed to create ${fullPath}`, error);
      throw error;
    }
  }
}
