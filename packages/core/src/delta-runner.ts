/**
 * Delta Runner
 *
 * One reconciliation pass for one resource identity:
 *   find → (absent: create | present: diff) → checkChanges → render
 *
 * Passes are not locked against each other; the scheduler that calls this is
 * expected to run distinct identities concurrently and never the same one
 * twice at once.
 */

import { Logger } from "@nestjs/common";
import type { Changes } from "./changes";
import { changedFields, isZero } from "./changes";
import type { DeltaTask, Target } from "./task";

export type DeltaAction = "create" | "update" | "none";

export interface DeltaRunResult {
  /** Identity of the task that was reconciled */
  id: string | undefined;
  /** What the pass dispatched to the target */
  action: DeltaAction;
  /** Fields that differed from live state (all desired fields on create) */
  changedFields: string[];
}

const logger = new Logger("DeltaRunner");

export async function runDeltaTask<T, TContext extends { target: Target }>(
  task: T & DeltaTask<T, TContext>,
  context: TContext
): Promise<DeltaRunResult> {
  const id = task.compareWithId();
  const { target } = context;

  let actual: T | undefined;
  if (target.checkExisting) {
    actual = await task.find(context);
  }

  const changes: Changes<T> = await task.buildChanges(actual);
  const fields: string[] = changedFields(changes);

  if (actual !== undefined && isZero(changes)) {
    logger.debug(`${task.kind} "${id}": no changes`);
    return { id, action: "none", changedFields: [] };
  }

  task.checkChanges(actual, task, changes);

  const action: DeltaAction = actual === undefined ? "create" : "update";
  logger.debug(`${task.kind} "${id}": ${action} via ${target.kind} (${fields.join(", ")})`);

  await task.render(context, actual, task, changes);

  return { id, action, changedFields: fields };
}
