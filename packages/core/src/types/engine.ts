/**
 * Contracts a query engine implements to be streamed by Tideway.
 *
 * The engine is push-based: it calls listener methods as results appear.
 * Tideway turns those calls into demand-driven streams.
 */

/** Server-assigned handle identifying an active live subscription */
export type SubscriptionToken = number;

/** Receives live-query change events */
export interface LiveResultListener<TEvent> {
  /** Called once per change event; the token identifies the subscription */
  onLiveResult(token: SubscriptionToken, event: TEvent): void;
  /** Called when the live subscription fails after it was registered */
  onLiveError(error: unknown): void;
}

/** Engine side of live queries */
export interface LiveQueryEngine<TEvent> {
  /**
   * Register a live query. Change events may be delivered to the listener
   * before the returned promise resolves with the token.
   */
  subscribe(query: string, listener: LiveResultListener<TEvent>): Promise<SubscriptionToken>;

  /** Best-effort stop of a live subscription. Failures are logged, never surfaced. */
  unsubscribe(token: SubscriptionToken): void | Promise<void>;
}

/** Receives rows of a one-shot query */
export interface ResultListener<TRow> {
  /**
   * Called once per row. The engine must wait for a returned promise before
   * producing the next row, and stop fetching when the result is `false`.
   */
  onResult(row: TRow): boolean | Promise<boolean>;
  /** Called once after the last row */
  onEnd(): void;
}

/** Options of a one-shot query */
export interface FetchOptions {
  /** Maximum number of rows to produce */
  limit?: number;
  /** Positional query parameters */
  params?: readonly unknown[];
}

/** Engine side of bounded, one-shot queries */
export interface FetchQueryEngine<TRow> {
  /**
   * Run a query, calling the listener for each row. Resolves when fetching
   * stops, rejects on failure.
   */
  fetch(query: string, options: FetchOptions, listener: ResultListener<TRow>): Promise<void>;
}

/** An engine offering both query styles */
export interface QueryEngine<TRow, TEvent> extends LiveQueryEngine<TEvent>, FetchQueryEngine<TRow> {}
