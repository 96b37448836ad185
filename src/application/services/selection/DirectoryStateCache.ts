import { TriState } from "../../../domain/model/TriState";
import { DirectoryStateCachePort } from "../../ports/driven/DirectoryStateCachePort";
import { normalizePath } from "../../../shared/utils/pathUtils";

/**
 * Caché en memoria de estados tri-estado por directorio.
 * Solo memoriza: todo su contenido se puede recalcular desde cero.
 */
export class DirectoryStateCache implements DirectoryStateCachePort {
  private readonly states: Map<string, TriState> = new Map();

  public get(dirPath: string): TriState | undefined {
    return this.states.get(normalizePath(dirPath));
  }

  public put(dirPath: string, state: TriState): void {
    this.states.set(normalizePath(dirPath), state);
  }

  public invalidate(dirPath: string): void {
    this.states.delete(normalizePath(dirPath));
  }

  public clear(): void {
    this.states.clear();
  }

  public get size(): number {
    return this.states.size;
  }
}
