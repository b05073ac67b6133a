// src/core/liveness/nameSet.ts

/**
 * Names of resources that something still references.
 * Only membership matters; nothing depends on iteration order.
 */
export type NameSet = ReadonlySet<string>;

/**
 * Collects names into a set, dropping references that carry no name.
 */
export class NameSetBuilder {
  private readonly names = new Set<string>();

  add(name: string | undefined): this {
    if (name) {
      this.names.add(name);
    }
    return this;
  }

  build(): NameSet {
    return new Set(this.names);
  }
}
