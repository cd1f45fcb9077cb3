/**
 * Lazily rendered content sources (instance metadata values, startup scripts).
 */

import { readFile } from "node:fs/promises";
import { ReconcileError, ReconcileErrorType } from "./errors";

export interface Resource {
  /** Human-readable origin, used in error messages */
  readonly source: string;
  /** Render the content */
  open(): Promise<string>;
}

export class StringResource implements Resource {
  readonly source = "literal";

  constructor(private readonly value: string) {}

  async open(): Promise<string> {
    return this.value;
  }
}

export class FileResource implements Resource {
  constructor(private readonly path: string) {}

  get source(): string {
    return `file ${this.path}`;
  }

  async open(): Promise<string> {
    return readFile(this.path, "utf8");
  }
}

/**
 * Render a resource to a string, naming the source when it cannot be read.
 */
export async function resourceAsString(resource: Resource): Promise<string> {
  try {
    return await resource.open();
  } catch (error: unknown) {
    throw new ReconcileError(
      `error rendering resource from ${resource.source}`,
      ReconcileErrorType.INVALID_SPEC,
      error
    );
  }
}

export async function resourcesMatch(a: Resource, b: Resource): Promise<boolean> {
  if (a === b) return true;
  const [left, right] = await Promise.all([resourceAsString(a), resourceAsString(b)]);
  return left === right;
}
