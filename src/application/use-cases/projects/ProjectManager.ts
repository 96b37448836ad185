import { Project } from "../../../domain/model/Project";
import { ProgressReporter } from "../../ports/driven/ProgressReporter";
import { ProjectRepositoryPort } from "../../ports/driven/ProjectRepositoryPort";
import { SelectionEngine } from "../selection/SelectionEngine";

/**
 * Lista de proyectos en memoria; cada cambio reescribe el documento completo
 */
export class ProjectManager {
  private projects: Project[] = [];

  constructor(
    private readonly repository: ProjectRepositoryPort,
    private readonly logger: ProgressReporter
  ) {}

  public loadAll(): Project[] {
    this.projects = this.repository.loadAll();
    this.logger.info(
      `ProjectManager.loadAll: Loaded ${this.projects.length} projects.`
    );
    return this.list();
  }

  public list(): Project[] {
    return this.projects.map((p) => ({
      ...p,
      selectedPaths: [...p.selectedPaths],
    }));
  }

  public find(name: string): Project | undefined {
    return this.list().find((p) => p.name === name);
  }

  /**
   * Guarda (o actualiza por nombre) la raíz y selección actuales del motor
   */
  public save(name: string, engine: SelectionEngine): Project {
    const project: Project = {
      name,
      rootPath: engine.rootPath,
      selectedPaths: engine.selectedPaths(),
    };

    const index = this.projects.findIndex((p) => p.name === name);
    if (index === -1) {
      this.projects.push(project);
    } else {
      this.projects[index] = project;
    }

    this.persist("save");
    return { ...project, selectedPaths: [...project.selectedPaths] };
  }

  /**
   * Aplica un proyecto guardado al motor
   * @returns false si no existe un proyecto con ese nombre
   */
  public load(name: string, engine: SelectionEngine): boolean {
    const project = this.projects.find((p) => p.name === name);
    if (!project) {
      this.logger.warn(`ProjectManager.load: Project not found: ${name}`);
      return false;
    }
    engine.loadSelection(project.rootPath, project.selectedPaths);
    return true;
  }

  public delete(name: string): boolean {
    const index = this.projects.findIndex((p) => p.name === name);
    if (index === -1) {
      return false;
    }
    this.projects.splice(index, 1);
    this.persist("delete");
    return true;
  }

  private persist(operation: string): void {
    if (!this.repository.saveAll(this.projects)) {
      this.logger.error(
        `ProjectManager.${operation}: Projects could not be persisted.`
      );
    }
  }
}
