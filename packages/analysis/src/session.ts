/**
 * AnalysisSession: the analyzer's public surface and the owner of every
 * table the engine uses: value universe, module table, import resolver,
 * specialization registry, work queue and scheduler.
 *
 * Sessions share nothing; several can live in one process.
 */

import { Scheduler, type QueueReporter, type SchedulerResult } from "./analysis/scheduler.js";
import { WorkQueue } from "./analysis/work-queue.js";
import { resolveLimits, type AnalysisLimits } from "./config/limits.js";
import type { HostInterpreter, HostModuleContext } from "./host/types.js";
import { ImportResolver } from "./modules/import-resolver.js";
import { MemberResult, type ExportedMember } from "./modules/member-result.js";
import { ModuleTable } from "./modules/module-table.js";
import { moduleNameFromUri, pathToModuleName, type FileExists } from "./modules/paths.js";
import { ProjectEntry } from "./modules/project-entry.js";
import { ResourceProjectEntry } from "./modules/resource-entry.js";
import { DEFAULT_RESOURCE_LOADER, installDefaultSpecializations, type ResourceLoaderTarget } from "./specializations/builtins.js";
import { SpecializationRegistry } from "./specializations/registry.js";
import type { CallHook, SpecializationFn, SpecializationInfo } from "./specializations/types.js";
import { invalidArgument } from "./shared/errors.js";
import { NOOP_LOGGER, type Logger } from "./shared/logger.js";
import { debug } from "./shared/debug.js";
import { ModuleInfo } from "./values/module-info.js";
import { MultipleMemberInfo } from "./values/multiple-member.js";
import type { Namespace } from "./values/namespace.js";
import { NamespaceSet } from "./values/namespace-set.js";
import { ValueUniverse } from "./values/universe.js";

/** Selects `next` vs `__next__`, zero-argument `super()` and `/` on ints. */
export type LanguageVersion = "2" | "3";

export interface AnalysisSessionOptions {
  readonly interpreter: HostInterpreter;
  readonly logger?: Logger;
  readonly limits?: Partial<AnalysisLimits>;
  /** Throw on host objects that cannot be classified instead of degrading to `object`. */
  readonly strictHostContract?: boolean;
  readonly languageVersion?: LanguageVersion;
  /** Install the built-in override table (default true). */
  readonly defaultSpecializations?: boolean;
  readonly resourceLoader?: ResourceLoaderTarget;
}

export type DirectoriesChangedListener = (directories: readonly string[]) => void;

export class AnalysisSession {
  readonly interpreter: HostInterpreter;
  readonly logger: Logger;
  readonly strictHostContract: boolean;
  readonly languageVersion: LanguageVersion;
  readonly defaultContext: HostModuleContext;

  readonly queue = new WorkQueue();
  readonly universe: ValueUniverse;
  readonly specializations: SpecializationRegistry;
  readonly modules: ModuleTable;
  readonly imports: ImportResolver;
  readonly scheduler: Scheduler;

  #limits: AnalysisLimits;
  readonly #entries = new Set<ProjectEntry>();
  /** Keyed by lower-cased path; file paths compare ignoring case. */
  readonly #entriesByPath = new Map<string, ProjectEntry>();
  readonly #resourcesByPath = new Map<string, ResourceProjectEntry>();
  /** Lower-cased directory → directory as first added. */
  readonly #directories = new Map<string, string>();
  readonly #directoryListeners = new Set<DirectoriesChangedListener>();
  #report: QueueReporter | undefined;
  #reportInterval: number | undefined;
  #disposed = false;

  constructor(options: AnalysisSessionOptions) {
    this.interpreter = options.interpreter;
    this.logger = options.logger ?? NOOP_LOGGER;
    this.strictHostContract = options.strictHostContract ?? false;
    this.languageVersion = options.languageVersion ?? "3";
    this.#limits = resolveLimits(options.limits);
    this.defaultContext = this.interpreter.createModuleContext();

    this.universe = new ValueUniverse(this);
    this.specializations = new SpecializationRegistry(this);
    this.modules = new ModuleTable(this);
    this.imports = new ImportResolver(this);
    this.scheduler = new Scheduler(() => this.#limits, this.logger);

    if (options.defaultSpecializations ?? true) {
      installDefaultSpecializations(
        this.specializations,
        this.interpreter.builtinModuleName,
        options.resourceLoader ?? DEFAULT_RESOURCE_LOADER,
      );
    }
    this.interpreter.initialize?.(this);
  }

  get limits(): AnalysisLimits {
    return this.#limits;
  }

  set limits(value: AnalysisLimits) {
    this.#limits = resolveLimits(value);
  }

  /** The host's builtin module (`builtins`), loaded on first use. */
  get builtinModule(): Namespace | undefined {
    return this.modules.getLoaded(this.interpreter.builtinModuleName)?.module ?? undefined;
  }

  get isDisposed(): boolean {
    return this.#disposed;
  }

  // ===========================================================================
  // Project entries
  // ===========================================================================

  /**
   * Registers a source module. Overrides logged for `moduleName` are applied
   * before this returns; units that failed to import the name run again.
   */
  addModule(moduleName: string | null, filePath: string | null, cookie?: unknown): ProjectEntry {
    const entry = new ProjectEntry(this, moduleName, filePath, cookie);
    this.#entries.add(entry);
    if (moduleName !== null) {
      for (const unit of this.modules.bindProject(moduleName, entry.moduleInfo)) unit.enqueue();
      this.#enqueueParentReaders(moduleName);
    }
    if (filePath !== null) this.#entriesByPath.set(pathKey(filePath), entry);
    debug.modules("module.add", { name: moduleName, path: filePath });
    return entry;
  }

  /** Removing an entry twice is a no-op. */
  removeModule(entry: ProjectEntry | ResourceProjectEntry | null | undefined): void {
    if (!entry) throw invalidArgument("entry", "a project entry is required");
    if (entry instanceof ResourceProjectEntry) {
      this.removeResourceFile(entry);
      return;
    }

    if (entry.filePath !== null && this.#entriesByPath.get(pathKey(entry.filePath)) === entry) {
      this.#entriesByPath.delete(pathKey(entry.filePath));
    }
    this.#entries.delete(entry);
    if (entry.moduleName !== null && this.modules.unbindProject(entry.moduleName, entry.moduleInfo)) {
      this.#enqueueParentReaders(entry.moduleName);
    }
    entry.removedFromProject();
    debug.modules("module.remove", { name: entry.moduleName, path: entry.filePath });
  }

  addResourceFile(filePath: string, cookie?: unknown): ResourceProjectEntry {
    const entry = new ResourceProjectEntry(filePath, cookie);
    const key = pathKey(filePath);
    this.#resourcesByPath.get(key)?.removedFromProject();
    this.#resourcesByPath.set(key, entry);
    return entry;
  }

  removeResourceFile(entry: ResourceProjectEntry | null | undefined): void {
    if (!entry) throw invalidArgument("entry", "a resource entry is required");
    const key = pathKey(entry.filePath);
    if (this.#resourcesByPath.get(key) === entry) this.#resourcesByPath.delete(key);
    entry.removedFromProject();
  }

  getEntryByPath(filePath: string): ProjectEntry | undefined {
    return this.#entriesByPath.get(pathKey(filePath));
  }

  getResourceByPath(filePath: string): ResourceProjectEntry | undefined {
    return this.#resourcesByPath.get(pathKey(filePath));
  }

  /** Paths as the entries were added with. */
  *modulesByPath(): IterableIterator<[string, ProjectEntry]> {
    for (const entry of this.#entriesByPath.values()) {
      if (entry.filePath !== null) yield [entry.filePath, entry];
    }
  }

  get entries(): ReadonlySet<ProjectEntry> {
    return this.#entries;
  }

  // ===========================================================================
  // Analysis directories
  // ===========================================================================

  get analysisDirectories(): readonly string[] {
    return [...this.#directories.values()];
  }

  /** Case-insensitive; returns whether the set changed. */
  addAnalysisDirectory(directory: string): boolean {
    const key = pathKey(directory);
    if (this.#directories.has(key)) return false;
    this.#directories.set(key, directory);
    this.#directoriesChanged();
    return true;
  }

  removeAnalysisDirectory(directory: string): boolean {
    if (!this.#directories.delete(pathKey(directory))) return false;
    this.#directoriesChanged();
    return true;
  }

  /** Returns the unsubscribe function. */
  onAnalysisDirectoriesChanged(listener: DirectoriesChangedListener): () => void {
    this.#directoryListeners.add(listener);
    return () => {
      this.#directoryListeners.delete(listener);
    };
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  getModules(topLevelOnly = false): MemberResult[] {
    return this.#moduleResults((name) => topLevelOnly && name.includes("."));
  }

  getModule(name: string): MemberResult[] {
    return this.#moduleResults((candidate) => candidate !== name);
  }

  /**
   * Members of the module at `names` (`["os", "path"]`). Without
   * `includeMembers` only sub-packages and module-valued aggregates are
   * listed.
   */
  getModuleMembers(
    names: readonly string[],
    includeMembers = false,
    context: HostModuleContext = this.defaultContext,
  ): MemberResult[] {
    const [head, ...rest] = names;
    if (head === undefined) return [];
    let module: Namespace | undefined = this.modules.getLoaded(head)?.module ?? undefined;
    for (const name of rest) module = module?.asModule()?.getChildPackage(context, name);
    const container = module?.asModule();
    if (!module || !container) return [];

    const members = module.getAllMembers(context);
    if (includeMembers) {
      return [...members].map(([name, values]) => new MemberResult(name, values));
    }
    const children = container.getChildrenPackages(context);
    const listed = new Set(children.map(([name]) => name));
    const results = children.map(([name, child]) => new MemberResult(name, child.selfSet, "module"));
    for (const [name, values] of members) {
      if (listed.has(name)) continue;
      if (values.ofType(isAggregate).some(holdsPlainModule)) results.push(new MemberResult(name, values));
    }
    return results;
  }

  /**
   * Candidate qualified names for `name`: matching modules first, then
   * `<module>.<name>` for every module, resolved when the loaded module
   * defines the member.
   */
  *findNameInAllModules(name: string): Generator<ExportedMember> {
    const references = [...this.modules.entries()].filter(([, reference]) => reference.isValid);
    for (const [moduleName] of references) {
      if (moduleName === name || moduleName.endsWith(`.${name}`)) yield { name: moduleName, resolved: true };
    }
    for (const [moduleName, reference] of references) {
      const module = reference.module?.asModule();
      yield {
        name: `${moduleName}.${name}`,
        resolved: module?.containsMember(this.defaultContext, name) ?? false,
      };
    }
  }

  // ===========================================================================
  // Specializations
  // ===========================================================================

  specializeFunction(moduleName: string, name: string, override: SpecializationFn, analyze = true): SpecializationInfo {
    return this.specializations.register(moduleName, name, override, analyze);
  }

  /** Calls to `<moduleName>.<name>` produce instances of `returnType` (`module.Type`). */
  specializeFunctionReturning(moduleName: string, name: string, returnType: string): SpecializationInfo {
    return this.specializations.registerReturning(moduleName, name, returnType);
  }

  addCallHook(moduleName: string, name: string, hook: CallHook): SpecializationInfo {
    return this.specializations.registerCallHook(moduleName, name, hook);
  }

  // ===========================================================================
  // Running
  // ===========================================================================

  /** `report` receives the queue size every `interval` analyzed units. */
  setQueueReporting(report: QueueReporter | undefined, interval?: number): void {
    if (interval !== undefined && (!Number.isInteger(interval) || interval <= 0)) {
      throw invalidArgument("interval", `expected a positive integer, got ${interval}`);
    }
    this.#report = report;
    this.#reportInterval = interval;
  }

  /** Runs queued units to a fixed point, or until `signal` aborts. */
  analyzeQueuedEntries(signal?: AbortSignal): SchedulerResult {
    return this.scheduler.run(this.queue, { signal, report: this.#report, interval: this.#reportInterval });
  }

  /**
   * Re-reads the host: module names, types and overrides are rebuilt and
   * every project entry is reset and queued again. Entry objects are kept.
   */
  reloadModules(): void {
    this.queue.clear();
    this.modules.reInit();
    this.universe.clear();
    this.imports.clear();
    this.specializations.reapplyAll();
    this.interpreter.initialize?.(this);
    for (const entry of this.#entries) {
      entry.reset();
      entry.analyze();
    }
    debug.modules("reload", { entries: this.#entries.size });
  }

  dispose(): void {
    if (this.#disposed) return;
    this.#disposed = true;
    this.queue.clear();
    this.#directoryListeners.clear();
    this.interpreter.dispose?.();
  }

  pathToModuleName(filePath: string, fileExists?: FileExists): string {
    return pathToModuleName(filePath, fileExists);
  }

  moduleNameFromUri(uri: string, fileExists?: FileExists): string {
    return moduleNameFromUri(uri, fileExists);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  #moduleResults(exclude: (name: string) => boolean): MemberResult[] {
    const results: MemberResult[] = [];
    for (const [name, reference] of this.modules.entries()) {
      if (!name.trim() || exclude(name) || !reference.isValid) continue;
      const load = (): NamespaceSet => this.modules.getLoaded(name)?.module?.selfSet ?? NamespaceSet.EMPTY;
      results.push(new MemberResult(name, load, "module"));
    }
    return results;
  }

  /** `pkg.sub` appearing or disappearing changes what `pkg.sub` reads as. */
  #enqueueParentReaders(moduleName: string): void {
    const lastDot = moduleName.lastIndexOf(".");
    if (lastDot === -1) return;
    const parent = this.modules.get(moduleName.slice(0, lastDot))?.module;
    if (!(parent instanceof ModuleInfo)) return;
    const variable = parent.scope.getVariable(moduleName.slice(lastDot + 1));
    for (const unit of variable?.dependents ?? []) unit.enqueue();
  }

  #directoriesChanged(): void {
    const directories = this.analysisDirectories;
    for (const listener of [...this.#directoryListeners]) listener(directories);
  }
}

function isAggregate(value: Namespace): value is MultipleMemberInfo {
  return value instanceof MultipleMemberInfo;
}

function holdsPlainModule(aggregate: MultipleMemberInfo): boolean {
  return aggregate.members.some((member) => member.asModule() !== undefined && !isAggregate(member));
}

function pathKey(filePath: string): string {
  return filePath.toLowerCase();
}
