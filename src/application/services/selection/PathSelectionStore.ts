import { normalizePath } from "../../../shared/utils/pathUtils";

/**
 * Banderas de selección explícitas por ruta absoluta.
 * Una ruta ausente se considera no seleccionada.
 */
export class PathSelectionStore {
  private readonly flags: Map<string, boolean> = new Map();

  /**
   * Escribe la bandera de una ruta (idempotente)
   */
  public set(filePath: string, selected: boolean): void {
    this.flags.set(normalizePath(filePath), selected);
  }

  public get(filePath: string): boolean {
    return this.flags.get(normalizePath(filePath)) ?? false;
  }

  /**
   * Indica si la ruta se ha marcado o desmarcado alguna vez
   */
  public has(filePath: string): boolean {
    return this.flags.has(normalizePath(filePath));
  }

  /**
   * Rutas con bandera `true`, en orden de inserción
   */
  public selectedPaths(): string[] {
    const result: string[] = [];
    this.flags.forEach((selected, filePath) => {
      if (selected) result.push(filePath);
    });
    return result;
  }

  /**
   * Reemplaza todo el contenido: cada ruta dada queda en `true`
   */
  public replaceAll(paths: Iterable<string>): void {
    this.flags.clear();
    for (const p of paths) {
      this.set(p, true);
    }
  }

  public clear(): void {
    this.flags.clear();
  }

  public get size(): number {
    return this.flags.size;
  }
}
