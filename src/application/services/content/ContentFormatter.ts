/**
 * Formato de cada archivo dentro del texto agregado
 */
export class ContentFormatter {
  public static readonly HEADER_PREFIX = "--- ";
  public static readonly HEADER_SUFFIX = " ---";

  /**
   * Cabecera con la ruta literal del archivo
   */
  formatHeader(path: string): string {
    return `${ContentFormatter.HEADER_PREFIX}${path}${ContentFormatter.HEADER_SUFFIX}`;
  }

  formatFileEntry(path: string, content: string): string {
    return `${this.formatHeader(path)}\n${content}\n`;
  }
}
