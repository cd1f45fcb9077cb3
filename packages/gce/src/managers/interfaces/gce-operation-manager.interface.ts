/**
 * GCE Operation Manager Interface
 *
 * Provides abstraction for waiting on GCE async operations.
 * Enables dependency injection for testing and modularity.
 */

/**
 * A zonal operation as returned by a mutating Compute Engine call.
 * Both fields accept either a short name or a full resource URL.
 */
export interface OperationHandle {
  name?: string | null;
  zone?: string | null;
}

/**
 * Interface for managing GCE operation polling.
 */
export interface IGceOperationManager {
  /**
   * Block until the operation reaches a terminal status.
   * Rejects when the finished operation carries errors.
   */
  waitForOperation(project: string, operation: OperationHandle): Promise<void>;
}
