import { z } from "zod";
import { Project } from "../../../domain/model/Project";
import { FileSystemPort } from "../../../application/ports/driven/FileSystemPort";
import { ProgressReporter } from "../../../application/ports/driven/ProgressReporter";
import { ProjectRepositoryPort } from "../../../application/ports/driven/ProjectRepositoryPort";
import { FILE_SYSTEM_MESSAGES } from "../../../shared/constants/fileSystemMessages";

export const UNTITLED_PROJECT_NAME = "Untitled Project";

/** Campos ausentes o inválidos se recuperan con valores por defecto */
const persistedProjectSchema = z.object({
  name: z.string().catch(UNTITLED_PROJECT_NAME),
  root_path: z.string().catch(() => process.cwd()),
  selected_paths: z
    .array(z.unknown())
    .catch([])
    .transform((items) =>
      items.filter((item): item is string => typeof item === "string")
    ),
});

const persistedDocumentSchema = z.object({
  projects: z.array(z.unknown()).catch([]),
});

type PersistedProject = z.infer<typeof persistedProjectSchema>;

/**
 * Persiste proyectos en un documento JSON:
 * `{ "projects": [ { "name", "root_path", "selected_paths" } ] }`
 */
export class JsonProjectRepository implements ProjectRepositoryPort {
  constructor(
    private readonly fsPort: FileSystemPort,
    private readonly filePath: string,
    private readonly logger: ProgressReporter
  ) {}

  loadAll(): Project[] {
    if (this.fsPort.kind(this.filePath) === null) {
      this.logger.debug(
        `JsonProjectRepository.loadAll: No projects file at ${this.filePath}.`
      );
      return [];
    }

    const raw = this.fsPort.readText(this.filePath);
    if (!raw.ok) {
      this.logger.error(
        `JsonProjectRepository.loadAll: ${FILE_SYSTEM_MESSAGES.ERRORS.PROJECTS_UNREADABLE(
          this.filePath,
          raw.error.message
        )}`
      );
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw.value);
    } catch (error) {
      this.logger.error(
        `JsonProjectRepository.loadAll: Malformed JSON in ${this.filePath}.`,
        error
      );
      return [];
    }

    const document = persistedDocumentSchema.safeParse(parsed);
    if (!document.success) {
      this.logger.warn(
        `JsonProjectRepository.loadAll: Unexpected document shape in ${this.filePath}.`
      );
      return [];
    }

    const projects: Project[] = [];
    document.data.projects.forEach((item, index) => {
      const project = persistedProjectSchema.safeParse(item);
      if (!project.success) {
        this.logger.warn(
          `JsonProjectRepository.loadAll: Skipping project #${index}: not an object.`
        );
        return;
      }
      projects.push({
        name: project.data.name,
        rootPath: project.data.root_path,
        selectedPaths: project.data.selected_paths,
      });
    });
    return projects;
  }

  saveAll(projects: Project[]): boolean {
    const document: { projects: PersistedProject[] } = {
      projects: projects.map((p) => ({
        name: p.name,
        root_path: p.rootPath,
        selected_paths: p.selectedPaths,
      })),
    };

    const written = this.fsPort.writeText(
      this.filePath,
      JSON.stringify(document, null, 2)
    );
    if (!written.ok) {
      this.logger.error(
        `JsonProjectRepository.saveAll: ${FILE_SYSTEM_MESSAGES.ERRORS.PROJECTS_WRITE(
          this.filePath,
          written.error.message
        )}`
      );
      return false;
    }
    return true;
  }
}
