import { mkdirSync, readFileSync, writeFileSync, existsSync } from 'fs';
import { dirname } from 'path';
import { formatProperties, parseProperties, type VariableValue } from '@courier/catalog';

/** Durable key/value storage behind the persistent variable layer. */
export interface VariableRepository {
  load(): Record<string, VariableValue>;
  save(values: Record<string, VariableValue>): void;
}

const PVARS_HEADER = 'courier variables file';

/**
 * Properties-file storage. Strings are written as-is and everything else as
 * JSON, so every value reads back as a string. Null (a capture that found
 * nothing) is not written: the name is simply undefined on the next load.
 */
export class PropertiesVariableRepository implements VariableRepository {
  constructor(readonly path: string) {}

  load(): Record<string, VariableValue> {
    if (!existsSync(this.path)) return {};
    return parseProperties(readFileSync(this.path, 'utf-8'));
  }

  save(values: Record<string, VariableValue>): void {
    const properties: Record<string, string> = {};
    for (const [name, value] of Object.entries(values)) {
      if (value === null) continue;
      properties[name] = typeof value === 'string' ? value : JSON.stringify(value);
    }
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, formatProperties(properties, PVARS_HEADER), 'utf-8');
  }
}

export class InMemoryVariableRepository implements VariableRepository {
  private stored: Record<string, VariableValue>;
  saves = 0;

  constructor(initial: Record<string, VariableValue> = {}) {
    this.stored = { ...initial };
  }

  load(): Record<string, VariableValue> {
    return { ...this.stored };
  }

  save(values: Record<string, VariableValue>): void {
    this.stored = { ...values };
    this.saves++;
  }
}
