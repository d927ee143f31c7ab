/**
 * Model Backend Port
 *
 * A loaded model artifact, ready to predict. The gateway only ever calls
 * predictBatch; single predictions go through the micro-batcher.
 */

export type BackendKind = 'linear' | 'module';

export interface ModelBackend {
  readonly kind: BackendKind;

  /**
   * Predict one output per input, in input order.
   * Rejects if any input is unusable; callers isolate items themselves.
   */
  predictBatch(inputs: unknown[]): Promise<unknown[]>;
}
