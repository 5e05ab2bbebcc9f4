export { TreeNode } from "./domain/model/TreeNode";
export type { Fence } from "./domain/model/Fence";
export type { BuildStats } from "./domain/model/BuildStats";
export type {
  LineRange,
  ScaffoldInput,
  ScaffoldOptions,
} from "./domain/model/ScaffoldOptions";
export type {
  ScaffoldFailure,
  ScaffoldResult,
  ScaffoldSuccess,
} from "./domain/model/ScaffoldResult";

export type { FileSystemPort, WriteMode } from "./application/ports/driven/FileSystemPort";
export type { NotificationPort } from "./application/ports/driven/NotificationPort";
export type { ProgressReporter } from "./application/ports/driven/ProgressReporter";
export type { ScaffoldUseCase } from "./application/ports/driving/ScaffoldUseCase";

export { sanitizeName } from "./application/services/naming/NameSanitizer";
export { extractComment } from "./application/services/naming/CommentExtractor";
export { findTreeRegion } from "./application/services/tree/TreeRegionDetector";
export { TreeNotationParser } from "./application/services/tree/TreeNotationParser";
export { TreeFormatter } from "./application/services/tree/TreeFormatter";
export { CodeFenceScanner } from "./application/services/fence/CodeFenceScanner";
export { extractFilename } from "./application/services/fence/FilenameInference";
export { formatComment } from "./application/services/content/CommentSyntax";
export { ScaffoldProject } from "./application/use-cases/scaffold/ScaffoldProject";

export { FsAdapter } from "./adapters/secondary/fs/FsAdapter";
export { ConsoleProgressReporter } from "./adapters/secondary/reporting/ConsoleProgressReporter";
export { BuildLogReporter } from "./adapters/secondary/reporting/BuildLogReporter";
