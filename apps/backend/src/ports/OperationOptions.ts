/**
 * Options accepted by every pipeline operation.
 */
export interface OperationOptions {
  /** Aborts the operation at its next batch boundary or network call */
  signal?: AbortSignal;
}
