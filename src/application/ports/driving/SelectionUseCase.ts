import { ContextResult } from "../../../domain/model/ContextResult";
import { TriState } from "../../../domain/model/TriState";

/**
 * Puerto primario: comandos que la capa de presentación envía al motor
 */
export interface SelectionUseCase {
  readonly rootPath: string;

  /**
   * Alterna un archivo, o un directorio de forma recursiva
   * @returns Bandera explícita resultante
   */
  toggle(path: string): boolean;

  /**
   * Aplica una selección a todo el subárbol.
   * @param selected Por defecto, la negación de la bandera actual
   */
  toggleRecursive(path: string, selected?: boolean): boolean;

  isSelected(path: string): boolean;

  getState(dirPath: string): TriState;

  /** Descarta todos los estados memorizados sin tocar la selección */
  recalculateAll(): void;

  generateContext(): ContextResult;
}
