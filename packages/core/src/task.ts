/**
 * Task and Target contracts
 *
 * A task describes one resource identity. The same task object is used for
 * the desired state (built from configuration) and for the actual state
 * (returned by `find`), and a render target turns the difference between
 * the two into either live backend calls or a provisioning template.
 */

import type { Changes } from "./changes";
import type { ResourceRegistry, RegistryRecord } from "./registry";

export interface Target {
  /** Discriminator used by tasks to pick their render path */
  readonly kind: string;
  /**
   * Whether live state must be read before rendering. Template targets never
   * talk to the backend, so every task renders as a create.
   */
  readonly checkExisting: boolean;
}

export interface ReconcileContext<
  TTarget extends Target,
  TCloud,
  TRecords extends { [K in keyof TRecords]: RegistryRecord },
> {
  target: TTarget;
  cloud: TCloud;
  registry: ResourceRegistry<TRecords>;
}

/**
 * A resource kind that can be reconciled by {@link runDeltaTask}.
 */
export interface DeltaTask<T, TContext extends { target: Target }> {
  /** Resource kind, for logging and error messages */
  readonly kind: string;

  /** Identity used to pair a desired task with its live counterpart */
  compareWithId(): string | undefined;

  /** Query live state. Resolves to `undefined` when the resource is absent. */
  find(context: TContext): Promise<T | undefined>;

  /** Field-wise difference between `actual` and this (desired) task */
  buildChanges(actual: T | undefined): Promise<Changes<T>>;

  /** Reject change sets this resource kind cannot apply, before rendering */
  checkChanges(actual: T | undefined, desired: T, changes: Changes<T>): void;

  /** Apply the change set through the context's target */
  render(
    context: TContext,
    actual: T | undefined,
    desired: T,
    changes: Changes<T>
  ): Promise<void>;
}
