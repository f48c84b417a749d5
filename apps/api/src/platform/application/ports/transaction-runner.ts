export type TransactionOptions = Readonly<{
  signal?: AbortSignal;
}>;

/**
 * Runs `work` in one database transaction: commits when it resolves, rolls
 * back when it rejects. `Tx` is the adapter's transaction handle. An
 * already aborted `signal` fails before the transaction opens.
 */
export abstract class TransactionRunner<Tx> {
  abstract run<T>(
    work: (tx: Tx) => Promise<T>,
    options?: TransactionOptions
  ): Promise<T>;
}
