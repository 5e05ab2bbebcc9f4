import { FsAdapter } from "../../../secondary/fs/FsAdapter";
import { ConsoleProgressReporter } from "../../../secondary/reporting/ConsoleProgressReporter";
import { ScaffoldProject } from "../../../../application/use-cases/scaffold/ScaffoldProject";
import { FileSystemPort } from "../../../../application/ports/driven/FileSystemPort";
import { NotificationPort } from "../../../../application/ports/driven/NotificationPort";
import { ProgressReporter } from "../../../../application/ports/driven/ProgressReporter";
import { ScaffoldUseCase } from "../../../../application/ports/driving/ScaffoldUseCase";
import { ScaffoldOptions } from "../../../../domain/model/ScaffoldOptions";
import { ConsoleNotificationService } from "../services/consoleNotificationService";

export type DefaultOptions = Omit<ScaffoldOptions, "documentPath">;

export interface Container {
  fsAdapter: FileSystemPort;
  logger: ProgressReporter;
  notificationService: NotificationPort;
  defaultOptions: DefaultOptions;
  createScaffoldUseCase: (reporter: ProgressReporter) => ScaffoldUseCase;
}

export function createContainer(verboseLogging: boolean = false): Container {
  const defaultOptions: DefaultOptions = {
    excludePatterns: [],
    keepLogOnSuccess: false,
    writeLog: true,
    logFileName: "docframe-build.log",
    dryRun: false,
    verboseLogging,
  };

  const fsAdapter = new FsAdapter();
  const logger = new ConsoleProgressReporter(verboseLogging, true);
  const notificationService = new ConsoleNotificationService();

  return {
    fsAdapter,
    logger,
    notificationService,
    defaultOptions,
    createScaffoldUseCase: (reporter) => new ScaffoldProject(fsAdapter, reporter),
  };
}
