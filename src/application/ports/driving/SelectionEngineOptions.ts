/**
 * Opciones globales del motor de selección
 */
export interface SelectionEngineOptions {
  /** Ruta raíz del árbol mostrado */
  rootPath: string;

  /** Patrones de ignorado personalizados (sintaxis .gitignore) */
  customIgnorePatterns: string[];

  /** Ocultar binarios, dependencias y artefactos de build habituales */
  includeDefaultPatterns: boolean;

  /** Incluir patrones de ignorado desde el .gitignore de la raíz */
  includeGitIgnore: boolean;

  /** Documento JSON donde se guardan los proyectos */
  projectsFilePath: string;

  /** Habilita logs detallados durante la ejecución */
  verboseLogging?: boolean;
}
