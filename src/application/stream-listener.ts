/**
 * Callback contract between the stream supervisor and whatever processes
 * deliveries. The supervisor depends on nothing else.
 */
export interface StreamListener {
  /**
   * Called once per raw feed message, serialized. Must not reject.
   * `signal` aborts when the supervisor shuts down.
   */
  onEvent(raw: unknown, signal?: AbortSignal): Promise<void>;
  /** Transport or feed-reported error that did not end the subscription. */
  onError(err: unknown): void;
}
