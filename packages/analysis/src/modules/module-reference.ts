import type { AnalysisUnit } from "../analysis/analysis-unit.js";
import type { Namespace } from "../values/namespace.js";

/**
 * Cell for one module name.
 *
 * - `isValid`: the name is known to exist (listed by the host or added as a
 *   project module). Placeholders created by failed imports are invalid.
 * - `isLoaded`: a load was attempted; `module` is then the result.
 * - `hasModule`: a value is bound. Loaded without a value means known-empty.
 */
export class ModuleReference {
  #module: Namespace | null = null;
  #loaded = false;
  #valid: boolean;
  /** Units that asked for this module; re-enqueued when it gets (re)bound. */
  readonly references = new Set<AnalysisUnit>();

  constructor(
    readonly name: string,
    options: { valid?: boolean; module?: Namespace } = {},
  ) {
    this.#valid = options.valid ?? true;
    if (options.module) this.fill(options.module);
  }

  get module(): Namespace | null {
    return this.#module;
  }

  get isValid(): boolean {
    return this.#valid;
  }

  get isLoaded(): boolean {
    return this.#loaded;
  }

  get hasModule(): boolean {
    return this.#module !== null;
  }

  fill(module: Namespace | null): void {
    this.#module = module;
    this.#loaded = true;
    if (module) this.#valid = true;
  }

  /** Back to "known name, not loaded". */
  reset(): void {
    this.#module = null;
    this.#loaded = false;
  }

  addReference(unit: AnalysisUnit): void {
    if (!unit.forEval) this.references.add(unit);
  }

  /** Hands back the waiting units and forgets them. */
  takeReferences(): AnalysisUnit[] {
    const units = [...this.references];
    this.references.clear();
    return units;
  }
}
