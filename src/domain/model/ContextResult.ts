/**
 * Resultado de la agregación de contenido
 */
export interface ContextResult {
  /** Texto concatenado con una cabecera por archivo */
  text: string;

  /** Número de archivos incluidos */
  fileCount: number;

  /** Aproximación de tokens: suma de floor(bytes / 4) por archivo */
  tokenCount: number;

  /** Rutas incluidas, en el orden de salida */
  files: string[];
}
