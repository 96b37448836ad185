import { isUtf8 } from "buffer";
import { ContextResult } from "../../../domain/model/ContextResult";
import { FileSystemPort } from "../../ports/driven/FileSystemPort";
import { ProgressReporter } from "../../ports/driven/ProgressReporter";
import { PathSelectionStore } from "../selection/PathSelectionStore";
import { TreeReader } from "../tree/TreeReader";
import { ContentFormatter } from "./ContentFormatter";
import { FILE_SYSTEM_MESSAGES } from "../../../shared/constants/fileSystemMessages";

const BYTES_PER_TOKEN = 4;

// UTF-8 si es válido; si no, latin1 conserva cada byte como un carácter
function decode(bytes: Buffer): string {
  return bytes.toString(isUtf8(bytes) ? "utf8" : "latin1");
}

/**
 * Concatena el contenido de los archivos seleccionados.
 * Lee el almacén de selección directamente, nunca la caché de estados.
 */
export class ContextAggregator {
  private readonly formatter = new ContentFormatter();

  constructor(
    private readonly fsPort: FileSystemPort,
    private readonly tree: TreeReader,
    private readonly logger: ProgressReporter
  ) {}

  /**
   * @param rootPath Si se indica, la salida sigue el orden del árbol desde esa raíz
   */
  aggregate(store: PathSelectionStore, rootPath?: string): ContextResult {
    this.logger.startOperation("ContextAggregator.aggregate");

    const selected = store.selectedPaths();
    const ordered =
      rootPath !== undefined
        ? this.tree.orderInTree(selected, rootPath)
        : selected;

    const chunks: string[] = [];
    const files: string[] = [];
    let tokenCount = 0;

    for (const filePath of ordered) {
      // Los directorios marcados no aportan nada por sí mismos
      if (this.fsPort.kind(filePath) !== "file") {
        this.logger.debug(
          `ContextAggregator.aggregate: ${FILE_SYSTEM_MESSAGES.ERRORS.NOT_A_FILE(filePath)}`
        );
        continue;
      }

      const content = this.fsPort.readFile(filePath);
      if (!content.ok) {
        this.logger.warn(
          `ContextAggregator.aggregate: ${FILE_SYSTEM_MESSAGES.ERRORS.FILE_UNOPENABLE(
            filePath,
            content.error.message
          )}`
        );
        continue;
      }

      chunks.push(
        this.formatter.formatFileEntry(filePath, decode(content.value))
      );
      files.push(filePath);
      tokenCount += Math.floor(content.value.byteLength / BYTES_PER_TOKEN);
    }

    this.logger.info(
      `ContextAggregator.aggregate: ${FILE_SYSTEM_MESSAGES.SUCCESS.FILES_AGGREGATED(
        files.length,
        tokenCount
      )}`
    );
    this.logger.endOperation("ContextAggregator.aggregate");

    return {
      text: chunks.join(""),
      fileCount: files.length,
      tokenCount,
      files,
    };
  }
}
