/**
 * Proyecto guardado: raíz del árbol y rutas marcadas
 */
export interface Project {
  /** Nombre visible del proyecto (clave única) */
  name: string;

  /** Ruta raíz mostrada al cargar el proyecto */
  rootPath: string;

  /** Rutas absolutas con bandera `true` */
  selectedPaths: string[];
}
