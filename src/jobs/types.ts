/** Log context attached to a queued dispatch job */
export interface JobContext {
  deliveryId?: string;
  eventName?: string;
  workflowFile?: string;
}

/** Job queue with per-key concurrency control */
export interface DispatchQueue {
  /** Enqueue a job under a key. Returns a Promise resolving to the job result. */
  enqueue<T>(key: string, fn: () => Promise<T>, context?: JobContext): Promise<T>;
  /** Number of target keys with queued or running jobs */
  activeKeys(): number;
}

export interface MessageBatcher<T> {
  /** Add an item; flushes immediately once the batch is full. */
  add(item: T): Promise<void>;
  /** Process whatever is buffered now. Resolves when that batch is handled. */
  flush(): Promise<void>;
  /** Flush the remainder and stop the timer. Later adds are rejected. */
  stop(): Promise<void>;
  /** Number of buffered, not yet flushed, items */
  size(): number;
}
