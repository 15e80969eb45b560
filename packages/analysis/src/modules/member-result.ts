import type { MemberType } from "../values/namespace.js";
import type { NamespaceSet } from "../values/namespace-set.js";

/**
 * A named completion candidate. Values are computed on first access so that
 * listing every module does not load every module.
 */
export class MemberResult {
  #values: NamespaceSet | undefined;
  readonly #compute: () => NamespaceSet;
  readonly #memberType: MemberType | undefined;

  constructor(
    readonly name: string,
    values: NamespaceSet | (() => NamespaceSet),
    memberType?: MemberType,
  ) {
    this.#compute = typeof values === "function" ? values : () => values;
    this.#memberType = memberType;
  }

  get values(): NamespaceSet {
    return (this.#values ??= this.#compute());
  }

  /** Shared member type of the values; `multiple` when they disagree. */
  get memberType(): MemberType {
    if (this.#memberType) return this.#memberType;
    let type: MemberType | undefined;
    for (const value of this.values) {
      if (type === undefined) type = value.memberType;
      else if (type !== value.memberType) return "multiple";
    }
    return type ?? "unknown";
  }

  toString(): string {
    return `${this.name} (${this.memberType})`;
  }
}

/** One hit of `findNameInAllModules`. */
export interface ExportedMember {
  /** Fully qualified: `pkg.mod` for modules, `pkg.mod.name` for members. */
  readonly name: string;
  /** False when the module exists but analysis has not confirmed the member. */
  readonly resolved: boolean;
}
