import * as path from "path";
import ignore, { Ignore } from "ignore";
import { FileSystemPort } from "../../ports/driven/FileSystemPort";
import { defaultIgnorePatterns } from "../../../shared/utils/ignorePatterns";
import { isWithin, rel } from "../../../shared/utils/pathUtils";

export interface IgnoreSettings {
  customIgnorePatterns: string[];
  includeDefaultPatterns: boolean;
  includeGitIgnore: boolean;
}

/**
 * Gestiona los patrones de ignorado que ocultan entradas del árbol
 */
export class IgnorePatternManager {
  private ignoreHandler: Ignore | null = null;
  private ignorePatterns: string[] = [];
  private includeDefaultPatterns = false;
  private includeGitIgnore = false;
  private rootPath: string | undefined;

  constructor(
    private readonly fsPort: FileSystemPort,
    rootPath?: string,
    settings?: Partial<IgnoreSettings>
  ) {
    this.rootPath = rootPath;
    this.ignorePatterns = settings?.customIgnorePatterns ?? [];
    this.includeDefaultPatterns = settings?.includeDefaultPatterns ?? false;
    this.includeGitIgnore = settings?.includeGitIgnore ?? false;
    this.initializeIgnoreHandler();
  }

  /**
   * Establece un nuevo directorio raíz (recarga el .gitignore)
   */
  public setRootPath(rootPath: string | undefined): void {
    this.rootPath = rootPath;
    this.initializeIgnoreHandler();
  }

  public setIgnorePatterns(patterns: string[]): void {
    this.ignorePatterns = [...patterns];
    this.initializeIgnoreHandler();
  }

  public getIgnorePatterns(): string[] {
    return [...this.ignorePatterns];
  }

  public setIncludeDefaultPatterns(value: boolean): void {
    this.includeDefaultPatterns = value;
    this.initializeIgnoreHandler();
  }

  /** Cambia en caliente el flag includeGitIgnore */
  public setIncludeGitIgnore(value: boolean): void {
    this.includeGitIgnore = value;
    this.initializeIgnoreHandler();
  }

  /**
   * Verifica si una entrada debe ocultarse.
   * Las rutas fuera de la raíz (y la propia raíz) nunca se ignoran.
   */
  public shouldIgnore(filePath: string, isDirectory = false): boolean {
    if (!this.ignoreHandler || !this.rootPath) {
      return false;
    }
    if (!isWithin(this.rootPath, filePath)) {
      return false;
    }

    const relativePath = rel(this.rootPath, filePath);
    if (relativePath === "") {
      return false;
    }

    return this.ignoreHandler.ignores(
      isDirectory ? `${relativePath}/` : relativePath
    );
  }

  private initializeIgnoreHandler(): void {
    const patterns: string[] = [];
    if (this.includeDefaultPatterns) {
      patterns.push(...defaultIgnorePatterns);
    }
    if (this.includeGitIgnore) {
      patterns.push(...this.getGitIgnorePatterns());
    }
    patterns.push(...this.ignorePatterns);

    // Sin patrones no hace falta consultar nada
    this.ignoreHandler = patterns.length > 0 ? ignore().add(patterns) : null;
  }

  /** Lee y devuelve los patrones del .gitignore si existe */
  private getGitIgnorePatterns(): string[] {
    if (!this.rootPath) return [];
    const result = this.fsPort.readText(path.join(this.rootPath, ".gitignore"));
    if (!result.ok) return [];
    return result.value
      .split(/\r?\n/)
      .map((l) => l.trim())
      .filter((l) => l && !l.startsWith("#"));
  }
}
