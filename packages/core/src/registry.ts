/**
 * Resource Registry
 *
 * Tasks refer to their siblings (networks, addresses, disks, ...) by kind and
 * name only. The registry maps those weak references to whatever the sibling
 * has published about itself, and is consulted lazily at mapping time, so a
 * reference can be declared before its target is registered.
 */

import { ReconcileError, ReconcileErrorType } from "./errors";

export interface ResourceRef<K extends string = string> {
  readonly kind: K;
  readonly name: string;
}

export function ref<K extends string>(kind: K, name: string): ResourceRef<K> {
  return { kind, name };
}

export function formatRef(r: ResourceRef): string {
  return `${r.kind}/${r.name}`;
}

export interface RegistryRecord {
  readonly name: string;
}

export class ResourceRegistry<TRecords extends { [K in keyof TRecords]: RegistryRecord }> {
  private readonly kinds: { [K in keyof TRecords]?: Map<string, TRecords[K]> } = {};

  register<K extends keyof TRecords & string>(kind: K, record: TRecords[K]): void {
    const byName = this.kinds[kind] ?? new Map<string, TRecords[K]>();
    if (byName.has(record.name)) {
      throw new ReconcileError(
        `${formatRef(ref(kind, record.name))} is already registered`,
        ReconcileErrorType.INVALID_SPEC
      );
    }
    byName.set(record.name, record);
    this.kinds[kind] = byName;
  }

  lookup<K extends keyof TRecords & string>(r: ResourceRef<K>): TRecords[K] | undefined {
    return this.kinds[r.kind]?.get(r.name);
  }

  /**
   * Like {@link lookup}, but a missing record means the dependency has not
   * been materialized yet.
   */
  require<K extends keyof TRecords & string>(r: ResourceRef<K>): TRecords[K] {
    const record = this.lookup(r);
    if (!record) {
      throw new ReconcileError(
        `${formatRef(r)} has not been registered`,
        ReconcileErrorType.DEPENDENCY_NOT_READY
      );
    }
    return record;
  }
}
