import {
  DirectoryEntry,
  EntryKind,
  FileSystemPort,
} from "../../ports/driven/FileSystemPort";
import { ProgressReporter } from "../../ports/driven/ProgressReporter";
import { IgnorePatternManager } from "../filter/IgnorePatternManager";
import { FsResult } from "../../../domain/model/FsFailure";
import { compareEntries } from "../../../shared/utils/sortUtils";
import { ancestorsOf, isWithin, normalizePath } from "../../../shared/utils/pathUtils";
import { FILE_SYSTEM_MESSAGES } from "../../../shared/constants/fileSystemMessages";

/**
 * Vista del árbol tal como se muestra: hijos ordenados y sin entradas ignoradas
 */
export class TreeReader {
  constructor(
    private readonly fsPort: FileSystemPort,
    private readonly ignoreManager: IgnorePatternManager,
    private readonly logger: ProgressReporter
  ) {}

  public kind(entryPath: string): EntryKind | null {
    return this.fsPort.kind(entryPath);
  }

  public isDirectory(entryPath: string): boolean {
    return this.fsPort.kind(entryPath) === "directory";
  }

  /**
   * Hijos directos visibles de un directorio: primero directorios, luego archivos.
   * Un directorio ilegible se reporta como fallo y queda registrado en el log.
   */
  public listChildren(dirPath: string): FsResult<DirectoryEntry[]> {
    const listing = this.fsPort.listDirectory(dirPath);
    if (!listing.ok) {
      this.logger.warn(
        `TreeReader.listChildren: ${FILE_SYSTEM_MESSAGES.ERRORS.DIRECTORY_UNREADABLE(
          dirPath,
          listing.error.message
        )}`
      );
      return listing;
    }

    const visible = listing.value.filter(
      (entry) =>
        !this.ignoreManager.shouldIgnore(
          entry.path,
          entry.kind === "directory"
        )
    );
    visible.sort(compareEntries);
    return { ok: true, value: visible };
  }

  /**
   * Ordena rutas según el recorrido del árbol desde `rootPath`
   * (mismo orden que listChildren, en profundidad). Las rutas que no
   * aparecen en el árbol van al final, en el orden recibido.
   */
  public orderInTree(paths: string[], rootPath: string): string[] {
    const root = normalizePath(rootPath);
    const remaining = new Set(paths.map(normalizePath));
    const ordered: string[] = [];

    // directorio → rutas pendientes por debajo de él; solo se baja donde hay alguna
    const pending = new Map<string, number>();
    for (const p of remaining) {
      if (p !== root && isWithin(root, p)) {
        this.adjustPending(pending, p, root, 1);
      }
    }

    if (remaining.delete(root)) {
      ordered.push(root);
    }
    this.collect(root, root, remaining, pending, ordered);

    return [...ordered, ...remaining];
  }

  private collect(
    dirPath: string,
    root: string,
    remaining: Set<string>,
    pending: Map<string, number>,
    out: string[]
  ): void {
    if ((pending.get(dirPath) ?? 0) === 0) return;

    const children = this.listChildren(dirPath);
    if (!children.ok) return;

    for (const child of children.value) {
      if (remaining.delete(child.path)) {
        out.push(child.path);
        this.adjustPending(pending, child.path, root, -1);
      }
      if (child.kind === "directory") {
        this.collect(child.path, root, remaining, pending, out);
      }
    }
  }

  private adjustPending(
    pending: Map<string, number>,
    entryPath: string,
    root: string,
    delta: number
  ): void {
    for (const dir of ancestorsOf(entryPath, root)) {
      pending.set(dir, (pending.get(dir) ?? 0) + delta);
    }
  }
}
