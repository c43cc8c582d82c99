import type { VariableValue } from '@courier/catalog';
import type { VariableRepository } from './repositories.js';

/**
 * The persistent variable layer: loaded from durable storage at run start,
 * written back by `flush`. Captures and script `set_var` calls land here and
 * outlive the row (and the run) that produced them.
 */
export class PersistentVariables {
  private readonly values: Map<string, VariableValue>;
  private dirty = false;

  constructor(private readonly repository: VariableRepository) {
    this.values = new Map(Object.entries(repository.load()));
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  get(name: string): VariableValue | undefined {
    return this.values.get(name);
  }

  entries() {
    return this.values.entries();
  }

  set(name: string, value: VariableValue): void {
    this.values.set(name, value);
    this.dirty = true;
  }

  /** Write pending changes to the repository. Returns whether anything was written. */
  flush(): boolean {
    if (!this.dirty) return false;
    this.repository.save(Object.fromEntries(this.values));
    this.dirty = false;
    return true;
  }
}
