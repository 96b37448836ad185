export { TriState } from "./domain/model/TriState";
export type { Project } from "./domain/model/Project";
export type { ContextResult } from "./domain/model/ContextResult";
export type { FsFailure, FsFailureKind, FsResult } from "./domain/model/FsFailure";

export type {
  DirectoryEntry,
  EntryKind,
  FileSystemPort,
} from "./application/ports/driven/FileSystemPort";
export type { ProgressReporter } from "./application/ports/driven/ProgressReporter";
export type { DirectoryStateCachePort } from "./application/ports/driven/DirectoryStateCachePort";
export type { ProjectRepositoryPort } from "./application/ports/driven/ProjectRepositoryPort";
export type { SelectionEngineOptions } from "./application/ports/driving/SelectionEngineOptions";
export type { SelectionUseCase } from "./application/ports/driving/SelectionUseCase";

export { PathSelectionStore } from "./application/services/selection/PathSelectionStore";
export { DirectoryStateCache } from "./application/services/selection/DirectoryStateCache";
export { SelectionPropagator } from "./application/services/selection/SelectionPropagator";
export type { PropagationSummary } from "./application/services/selection/SelectionPropagator";
export { TreeStateResolver } from "./application/services/selection/TreeStateResolver";
export { TreeReader } from "./application/services/tree/TreeReader";
export { IgnorePatternManager } from "./application/services/filter/IgnorePatternManager";
export { ContextAggregator } from "./application/services/content/ContextAggregator";
export { SelectionEngine } from "./application/use-cases/selection/SelectionEngine";
export { ProjectManager } from "./application/use-cases/projects/ProjectManager";

export { FsAdapter } from "./adapters/secondary/fs/FsAdapter";
export { ConsoleProgressReporter } from "./adapters/secondary/reporting/ConsoleProgressReporter";
export { JsonProjectRepository } from "./adapters/secondary/persistence/JsonProjectRepository";
export { createContainer } from "./adapters/primary/di/dependencyContainer";
export type { Container } from "./adapters/primary/di/dependencyContainer";
export { loadConfiguration } from "./adapters/primary/di/configuration";
