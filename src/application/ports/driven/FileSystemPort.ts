import { FsResult } from "../../../domain/model/FsFailure";

export type EntryKind = "file" | "directory" | "other";

export interface DirectoryEntry {
  /** Nombre dentro del directorio padre */
  name: string;

  /** Ruta absoluta normalizada */
  path: string;

  /** Los enlaces simbólicos se reportan como "other" y no se recorren */
  kind: EntryKind;
}

/**
 * Puerto secundario (síncrono) para leer el árbol de archivos.
 * Ningún método lanza: los fallos de permisos o E/S vuelven como `FsResult`.
 */
export interface FileSystemPort {
  /**
   * Tipo actual de una ruta, siguiendo enlaces simbólicos.
   * @returns null si la ruta no existe o no se puede consultar
   */
  kind(path: string): EntryKind | null;

  /**
   * Lista las entradas directas de un directorio, sin orden garantizado.
   */
  listDirectory(dirPath: string): FsResult<DirectoryEntry[]>;

  /** Contenido en bruto de un archivo regular */
  readFile(filePath: string): FsResult<Buffer>;

  readText(filePath: string): FsResult<string>;

  /**
   * Escribe (truncando) un archivo de texto, creando los directorios padre.
   */
  writeText(filePath: string, content: string): FsResult<void>;
}
