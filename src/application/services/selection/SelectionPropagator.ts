import { EntryKind } from "../../ports/driven/FileSystemPort";
import { DirectoryStateCachePort } from "../../ports/driven/DirectoryStateCachePort";
import { ProgressReporter } from "../../ports/driven/ProgressReporter";
import { PathSelectionStore } from "./PathSelectionStore";
import { TreeReader } from "../tree/TreeReader";
import { ancestorsOf, normalizePath } from "../../../shared/utils/pathUtils";

export interface PropagationSummary {
  /** Entradas cuya bandera se escribió */
  visited: number;

  /** Directorios ilegibles cuyo subárbol se omitió */
  skipped: string[];
}

/**
 * Aplica selecciones al almacén y mantiene la caché libre de estados obsoletos
 */
export class SelectionPropagator {
  constructor(
    private readonly store: PathSelectionStore,
    private readonly cache: DirectoryStateCachePort,
    private readonly tree: TreeReader,
    private readonly logger: ProgressReporter,
    private readonly getRootPath: () => string
  ) {}

  /**
   * Marca `rootPath` y todo su subárbol con `selected`.
   * Invalida cada directorio recorrido y todos los ancestros hasta la raíz mostrada, incluida.
   */
  public applyRecursive(
    rootPath: string,
    selected: boolean
  ): PropagationSummary {
    const target = normalizePath(rootPath);
    const summary: PropagationSummary = { visited: 0, skipped: [] };

    this.walk(target, this.tree.kind(target), selected, summary);
    this.cache.invalidate(target);
    this.invalidateAncestors(target);

    if (summary.skipped.length > 0) {
      this.logger.warn(
        `SelectionPropagator.applyRecursive: Skipped ${summary.skipped.length} unreadable directories under ${target}.`
      );
    }
    this.logger.debug(
      `SelectionPropagator.applyRecursive: ${selected ? "Selected" : "Deselected"} ${summary.visited} entries under ${target}.`
    );
    return summary;
  }

  /**
   * Alterna la bandera de un único archivo.
   * También descarta la entrada propia: la ruta pudo ser un directorio ya desaparecido.
   * @returns Nueva bandera
   */
  public toggle(filePath: string): boolean {
    const next = !this.store.get(filePath);
    this.store.set(filePath, next);
    this.cache.invalidate(filePath);
    this.invalidateAncestors(filePath);
    return next;
  }

  private walk(
    entryPath: string,
    kind: EntryKind | null,
    selected: boolean,
    summary: PropagationSummary
  ): void {
    this.store.set(entryPath, selected);
    summary.visited++;

    if (kind !== "directory") return;

    // Los descendientes también cambian de estado
    this.cache.invalidate(entryPath);

    const children = this.tree.listChildren(entryPath);
    if (!children.ok) {
      summary.skipped.push(entryPath);
      return;
    }
    for (const child of children.value) {
      this.walk(child.path, child.kind, selected, summary);
    }
  }

  private invalidateAncestors(entryPath: string): void {
    for (const ancestor of ancestorsOf(entryPath, this.getRootPath())) {
      this.cache.invalidate(ancestor);
    }
  }
}
