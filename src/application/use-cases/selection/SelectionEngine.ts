import { ContextResult } from "../../../domain/model/ContextResult";
import { TriState } from "../../../domain/model/TriState";
import { FileSystemPort } from "../../ports/driven/FileSystemPort";
import { ProgressReporter } from "../../ports/driven/ProgressReporter";
import { DirectoryStateCachePort } from "../../ports/driven/DirectoryStateCachePort";
import { SelectionEngineOptions } from "../../ports/driving/SelectionEngineOptions";
import { SelectionUseCase } from "../../ports/driving/SelectionUseCase";
import { PathSelectionStore } from "../../services/selection/PathSelectionStore";
import { DirectoryStateCache } from "../../services/selection/DirectoryStateCache";
import {
  PropagationSummary,
  SelectionPropagator,
} from "../../services/selection/SelectionPropagator";
import { TreeStateResolver } from "../../services/selection/TreeStateResolver";
import { TreeReader } from "../../services/tree/TreeReader";
import { IgnorePatternManager } from "../../services/filter/IgnorePatternManager";
import { ContextAggregator } from "../../services/content/ContextAggregator";
import { normalizePath } from "../../../shared/utils/pathUtils";

export type SelectionEngineSettings = Pick<SelectionEngineOptions, "rootPath"> &
  Partial<
    Pick<
      SelectionEngineOptions,
      "customIgnorePatterns" | "includeDefaultPatterns" | "includeGitIgnore"
    >
  >;

/**
 * Dueño del estado de selección: almacén de banderas y caché de estados.
 * Todas las operaciones son síncronas y se ejecutan hasta completarse.
 */
export class SelectionEngine implements SelectionUseCase {
  private _rootPath: string;
  private _lastResult: ContextResult | undefined;
  private _lastPropagation: PropagationSummary | undefined;

  private readonly store = new PathSelectionStore();
  private readonly cache: DirectoryStateCachePort;
  private readonly ignoreManager: IgnorePatternManager;
  private readonly tree: TreeReader;
  private readonly propagator: SelectionPropagator;
  private readonly resolver: TreeStateResolver;
  private readonly aggregator: ContextAggregator;

  constructor(
    fsPort: FileSystemPort,
    private readonly logger: ProgressReporter,
    settings: SelectionEngineSettings,
    cache?: DirectoryStateCachePort
  ) {
    this._rootPath = normalizePath(settings.rootPath);
    this.cache = cache ?? new DirectoryStateCache();
    this.ignoreManager = new IgnorePatternManager(
      fsPort,
      this._rootPath,
      settings
    );
    this.tree = new TreeReader(fsPort, this.ignoreManager, logger);
    this.propagator = new SelectionPropagator(
      this.store,
      this.cache,
      this.tree,
      logger,
      () => this._rootPath
    );
    this.resolver = new TreeStateResolver(this.store, this.cache, this.tree);
    this.aggregator = new ContextAggregator(fsPort, this.tree, logger);
  }

  public get rootPath(): string {
    return this._rootPath;
  }

  /** Último resultado de generateContext */
  public get lastResult(): ContextResult | undefined {
    return this._lastResult;
  }

  public get lastPropagation(): PropagationSummary | undefined {
    return this._lastPropagation;
  }

  /**
   * Cambia la raíz mostrada. La selección y la caché se descartan.
   */
  public setRootPath(rootPath: string): void {
    this._rootPath = normalizePath(rootPath);
    this.store.clear();
    this.cache.clear();
    this._lastResult = undefined;
    this.ignoreManager.setRootPath(this._rootPath);
    this.logger.info(`SelectionEngine.setRootPath: Root set to ${this._rootPath}`);
  }

  /**
   * Reemplaza la selección completa (carga de proyecto)
   */
  public loadSelection(rootPath: string, selectedPaths: string[]): void {
    this.setRootPath(rootPath);
    this.store.replaceAll(selectedPaths);
    this.logger.info(
      `SelectionEngine.loadSelection: Loaded ${this.store.size} selected paths.`
    );
  }

  public toggle(entryPath: string): boolean {
    if (this.tree.isDirectory(entryPath)) {
      return this.toggleRecursive(entryPath);
    }
    return this.propagator.toggle(entryPath);
  }

  public toggleRecursive(entryPath: string, selected?: boolean): boolean {
    const next = selected ?? !this.store.get(entryPath);
    this._lastPropagation = this.propagator.applyRecursive(entryPath, next);
    return next;
  }

  public isSelected(entryPath: string): boolean {
    return this.store.get(entryPath);
  }

  public getState(dirPath: string): TriState {
    return this.resolver.resolve(dirPath);
  }

  public getStates(dirPaths: string[]): Map<string, TriState> {
    const states = new Map<string, TriState>();
    for (const dirPath of dirPaths) {
      states.set(normalizePath(dirPath), this.resolver.resolve(dirPath));
    }
    return states;
  }

  public recalculateAll(): void {
    const discarded = this.cache.size;
    this.cache.clear();
    this.logger.info(
      `SelectionEngine.recalculateAll: Discarded ${discarded} cached directory states.`
    );
  }

  public generateContext(): ContextResult {
    this._lastResult = this.aggregator.aggregate(this.store, this._rootPath);
    return this._lastResult;
  }

  /**
   * Rutas marcadas en orden del árbol, seguidas de las que quedan fuera de él
   */
  public selectedPaths(): string[] {
    return this.tree.orderInTree(this.store.selectedPaths(), this._rootPath);
  }

  public setIgnorePatterns(patterns: string[]): void {
    this.ignoreManager.setIgnorePatterns(patterns);
    this.cache.clear();
  }

  public setIncludeDefaultPatterns(value: boolean): void {
    this.ignoreManager.setIncludeDefaultPatterns(value);
    this.cache.clear();
  }

  public setIncludeGitIgnore(value: boolean): void {
    this.ignoreManager.setIncludeGitIgnore(value);
    this.cache.clear();
  }
}
