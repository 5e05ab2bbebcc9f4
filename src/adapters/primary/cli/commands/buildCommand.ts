import * as path from "path";
import { ScaffoldOptions } from "../../../../domain/model/ScaffoldOptions";
import { TreeFormatter } from "../../../../application/services/tree/TreeFormatter";
import { BuildLogReporter } from "../../../secondary/reporting/BuildLogReporter";
import { describeError } from "../../../../shared/utils/textUtils";
import { USER_MESSAGES } from "../constants/userMessages";
import { Container } from "../di/dependencyContainer";
import { selectLines } from "../options/lineRange";

/**
 * Ejecuta una construcción completa desde un documento.
 * @returns Código de salida del proceso
 */
export function runBuildCommand(options: ScaffoldOptions, container: Container): number {
  const { fsAdapter, logger, notificationService } = container;
  const documentPath = path.resolve(options.documentPath);

  let text: string;
  try {
    text = fsAdapter.readFile(documentPath);
  } catch (error) {
    notificationService.showError(
      USER_MESSAGES.ERRORS.DOCUMENT_UNREADABLE(documentPath, describeError(error))
    );
    return 1;
  }

  const source = options.lineRange ? "selection" : "document";
  if (options.lineRange) {
    text = selectLines(text, options.lineRange);
  }

  const documentDir = path.dirname(documentPath);
  const rootPath = options.rootPath ? path.resolve(options.rootPath) : documentDir;

  const buildLog =
    options.writeLog && !options.dryRun
      ? new BuildLogReporter(fsAdapter, {
          logPath: path.join(documentDir, options.logFileName),
          rootPath,
          keepLogOnSuccess: options.keepLogOnSuccess,
          forward: logger,
        })
      : undefined;
  const reporter = buildLog ?? logger;

  reporter.info(`Building from ${source}: ${documentPath}`);
  const result = container.createScaffoldUseCase(reporter).execute({
    text,
    rootPath,
    excludePatterns: options.excludePatterns,
    dryRun: options.dryRun,
  });
  const logPath = buildLog?.finalize();

  if (!result.ok) {
    notificationService.showError(USER_MESSAGES.ERRORS.BUILD_FAILED(result.error, logPath));
    return 1;
  }

  if (options.dryRun) {
    notificationService.showInformation(
      USER_MESSAGES.INFO.DRY_RUN_PLAN(
        result.rootPath,
        new TreeFormatter().formatForest(result.forest),
        result.fences.map((fence) => `${fence.filename} (line ${fence.line + 1})`)
      )
    );
    return 0;
  }

  notificationService.showInformation(
    USER_MESSAGES.INFO.BUILD_SUCCEEDED({
      ...result.stats,
      source,
      rootPath: result.rootPath,
      fencesProcessed: result.fences.length,
      logPath,
    })
  );
  if (result.stats.excluded > 0) {
    notificationService.showWarning(USER_MESSAGES.WARNINGS.EXCLUDED(result.stats.excluded));
  }
  if (result.stats.fencesFailed > 0) {
    notificationService.showWarning(
      USER_MESSAGES.WARNINGS.FENCES_FAILED(result.stats.fencesFailed, logPath)
    );
  }
  return 0;
}
