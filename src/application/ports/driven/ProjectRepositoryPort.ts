import { Project } from "../../../domain/model/Project";

/**
 * Puerto secundario para la persistencia de la lista de proyectos
 */
export interface ProjectRepositoryPort {
  /**
   * Lee todos los proyectos guardados.
   * @returns Lista vacía si el documento no existe o no se puede interpretar
   */
  loadAll(): Project[];

  /**
   * Reemplaza el documento completo con la lista dada.
   * @returns true si se escribió correctamente
   */
  saveAll(projects: Project[]): boolean;
}
