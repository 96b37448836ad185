import { FsAdapter } from "../../secondary/fs/FsAdapter";
import { ConsoleProgressReporter } from "../../secondary/reporting/ConsoleProgressReporter";
import { JsonProjectRepository } from "../../secondary/persistence/JsonProjectRepository";
import { FileSystemPort } from "../../../application/ports/driven/FileSystemPort";
import { ProgressReporter } from "../../../application/ports/driven/ProgressReporter";
import { ProjectRepositoryPort } from "../../../application/ports/driven/ProjectRepositoryPort";
import { SelectionEngineOptions } from "../../../application/ports/driving/SelectionEngineOptions";
import { SelectionEngine } from "../../../application/use-cases/selection/SelectionEngine";
import { ProjectManager } from "../../../application/use-cases/projects/ProjectManager";
import { loadConfiguration } from "./configuration";

export interface Container {
  fsAdapter: FileSystemPort;
  logger: ProgressReporter;
  projectRepository: ProjectRepositoryPort;
  engine: SelectionEngine;
  projectManager: ProjectManager;
  options: SelectionEngineOptions;
}

export interface ContainerOverrides {
  fsAdapter?: FileSystemPort;
  logger?: ProgressReporter;
}

/**
 * Crea el motor y sus colaboradores. Las opciones no indicadas salen del entorno.
 */
export function createContainer(
  options: Partial<SelectionEngineOptions> = {},
  overrides: ContainerOverrides = {}
): Container {
  const resolved: SelectionEngineOptions = {
    ...loadConfiguration(),
    ...options,
  };

  const logger =
    overrides.logger ??
    new ConsoleProgressReporter(resolved.verboseLogging ?? false, true);
  const fsAdapter = overrides.fsAdapter ?? new FsAdapter();

  const projectRepository = new JsonProjectRepository(
    fsAdapter,
    resolved.projectsFilePath,
    logger
  );
  const engine = new SelectionEngine(fsAdapter, logger, resolved);
  const projectManager = new ProjectManager(projectRepository, logger);
  projectManager.loadAll();

  return {
    fsAdapter,
    logger,
    projectRepository,
    engine,
    projectManager,
    options: resolved,
  };
}
