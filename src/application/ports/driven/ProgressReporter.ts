/**
 * Puerto de logging para las operaciones del motor de selección
 */
export interface ProgressReporter {
  /**
   * Inicia una operación con temporizador
   * @param label Etiqueta para identificar la operación
   */
  startOperation(label: string): void;

  /**
   * Finaliza una operación con temporizador
   * @param label Etiqueta usada en startOperation
   */
  endOperation(label: string): void;

  info(message: string): void;

  warn(message: string): void;

  /**
   * Reporta un mensaje de error
   * @param error Objeto de error opcional
   */
  error(message: string, error?: unknown): void;

  /** Solo visible con logging detallado */
  debug(message: string, ...optionalParams: unknown[]): void;
}
