import { EMPTY_BUILD_STATS } from "../../../domain/model/BuildStats";
import { ScaffoldInput } from "../../../domain/model/ScaffoldOptions";
import { ScaffoldResult } from "../../../domain/model/ScaffoldResult";
import { FileSystemPort } from "../../ports/driven/FileSystemPort";
import { ProgressReporter } from "../../ports/driven/ProgressReporter";
import { ScaffoldUseCase } from "../../ports/driving/ScaffoldUseCase";
import { ConsoleProgressReporter } from "../../../adapters/secondary/reporting/ConsoleProgressReporter";
import { CodeFenceScanner } from "../../services/fence/CodeFenceScanner";
import { ExclusionFilter } from "../../services/filter/ExclusionFilter";
import { TreeFormatter } from "../../services/tree/TreeFormatter";
import { TreeNotationParser } from "../../services/tree/TreeNotationParser";
import { findTreeRegion } from "../../services/tree/TreeRegionDetector";
import { describeError } from "../../../shared/utils/textUtils";
import { BuildLedger } from "./services/BuildLedger";
import { resolveBuildRoot } from "./services/BuildRootResolver";
import { FenceContentFiller } from "./services/FenceContentFiller";
import { TreeBuilder } from "./services/TreeBuilder";

export const SCAFFOLD_ERRORS = {
  NO_CONTENT: "No content to build from.",
  NO_STRUCTURE: "No valid tree structure found.",
} as const;

export class ScaffoldProject implements ScaffoldUseCase {
  private readonly logger: ProgressReporter;
  private readonly parser: TreeNotationParser;
  private readonly scanner: CodeFenceScanner;
  private readonly formatter = new TreeFormatter();

  constructor(
    private readonly fsPort: FileSystemPort,
    logger?: ProgressReporter
  ) {
    this.logger = logger ?? new ConsoleProgressReporter(false, false);
    this.parser = new TreeNotationParser(this.logger);
    this.scanner = new CodeFenceScanner(this.logger);
  }

  execute(input: ScaffoldInput): ScaffoldResult {
    this.logger.startOperation("ScaffoldProject.execute");
    this.logger.info(`🚀 Building from ${input.text.length} characters into ${input.rootPath}`);
    const ledger = new BuildLedger();

    try {
      if (!input.text.trim()) {
        this.logger.error(SCAFFOLD_ERRORS.NO_CONTENT);
        return { ok: false, error: SCAFFOLD_ERRORS.NO_CONTENT, stats: ledger.toStats() };
      }

      this.logger.startOperation("Tree detection");
      const region = findTreeRegion(input.text);
      this.logger.info(
        `Tree range: lines ${region.start + 1} to ${region.end ?? "end of document"}`
      );
      const forest = this.parser.parse(input.text, region.start, region.end);
      this.logger.endOperation("Tree detection");

      if (forest.length === 0) {
        this.logger.error(SCAFFOLD_ERRORS.NO_STRUCTURE);
        return { ok: false, error: SCAFFOLD_ERRORS.NO_STRUCTURE, stats: ledger.toStats() };
      }
      this.logger.info(`Parsed ${forest.length} root node(s)`);
      this.logger.debug(`Parsed tree:\n${this.formatter.formatForest(forest)}`);

      this.logger.startOperation("Code fence detection");
      const fences = this.scanner.scan(input.text);
      this.logger.endOperation("Code fence detection");

      const plan = resolveBuildRoot(forest, input.rootPath);
      this.logger.info(
        plan.promotedRoot
          ? `Single root detected: ${plan.promotedRoot.name}`
          : "Multiple roots detected, building under the document directory"
      );
      this.logger.info(`Final root path: ${plan.rootPath}`);

      if (input.dryRun) {
        this.logger.info("Dry run: no changes written");
        return { ok: true, stats: { ...EMPTY_BUILD_STATS }, rootPath: plan.rootPath, forest, fences };
      }

      const exclusions = new ExclusionFilter(input.excludePatterns ?? []);

      this.logger.startOperation("Building file structure");
      new TreeBuilder(this.fsPort, this.logger, exclusions).build(plan, ledger);
      this.logger.endOperation("Building file structure");

      this.logger.startOperation("Filling content from code fences");
      new FenceContentFiller(this.fsPort, this.logger, exclusions).fill(fences, plan, ledger);
      this.logger.endOperation("Filling content from code fences");

      this.logger.info("🎉 Build completed");
      return { ok: true, stats: ledger.toStats(), rootPath: plan.rootPath, forest, fences };
    } catch (err: unknown) {
      const errorMessage = describeError(err);
      this.logger.error(`❌ Build failed: ${errorMessage}`, err);
      return { ok: false, error: errorMessage, stats: ledger.toStats() };
    } finally {
      this.logger.endOperation("ScaffoldProject.execute");
    }
  }
}
