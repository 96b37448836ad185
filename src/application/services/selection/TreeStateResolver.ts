import { TriState } from "../../../domain/model/TriState";
import { DirectoryStateCachePort } from "../../ports/driven/DirectoryStateCachePort";
import { PathSelectionStore } from "./PathSelectionStore";
import { TreeReader } from "../tree/TreeReader";
import { normalizePath } from "../../../shared/utils/pathUtils";

/**
 * Calcula el estado tri-estado de un directorio a partir de sus hijos,
 * memorizando cada resultado en la caché inyectada.
 */
export class TreeStateResolver {
  constructor(
    private readonly store: PathSelectionStore,
    private readonly cache: DirectoryStateCachePort,
    private readonly tree: TreeReader
  ) {}

  public resolve(dirPath: string): TriState {
    const key = normalizePath(dirPath);
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const state = this.compute(key);
    this.cache.put(key, state);
    return state;
  }

  private compute(dirPath: string): TriState {
    // Archivos y rutas inexistentes no se listan
    if (!this.tree.isDirectory(dirPath)) {
      return this.ownState(dirPath);
    }

    // Vacío o ilegible: solo cuenta la bandera propia
    const children = this.tree.listChildren(dirPath);
    if (!children.ok || children.value.length === 0) {
      return this.ownState(dirPath);
    }

    let foundSelected = false;
    let foundUnselected = false;

    for (const child of children.value) {
      if (child.kind === "directory") {
        const childState = this.resolve(child.path);
        if (childState !== TriState.NotSelected) foundSelected = true;
        if (childState !== TriState.FullySelected) foundUnselected = true;
      } else if (this.store.get(child.path)) {
        foundSelected = true;
      } else {
        foundUnselected = true;
      }

      if (foundSelected && foundUnselected) break;
    }

    if (foundSelected && foundUnselected) return TriState.PartiallySelected;
    if (foundSelected) return TriState.FullySelected;
    return TriState.NotSelected;
  }

  private ownState(entryPath: string): TriState {
    return this.store.get(entryPath)
      ? TriState.FullySelected
      : TriState.NotSelected;
  }
}
