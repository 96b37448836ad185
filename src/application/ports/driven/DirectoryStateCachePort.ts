import { TriState } from "../../../domain/model/TriState";

/**
 * Memoria de estados tri-estado por directorio.
 * Inyectada en el resolver para poder sustituirla en tests.
 */
export interface DirectoryStateCachePort {
  get(dirPath: string): TriState | undefined;
  put(dirPath: string, state: TriState): void;
  invalidate(dirPath: string): void;
  clear(): void;
  readonly size: number;
}
