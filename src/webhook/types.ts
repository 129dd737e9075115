import type { EventMessage } from "../mapping/types.ts";

export interface WebhookEvent {
  /** The X-GitHub-Delivery header value */
  id: string;
  /** The X-GitHub-Event header value (e.g., "pull_request", "check_suite") */
  name: string;
  /** The parsed webhook payload */
  payload: Record<string, unknown>;
}

export interface EventFilter {
  /** Returns true when at least one mapping rule could match this event type and action. */
  shouldQueue(eventName: string, action: string): boolean;
}

/** Transport record as it sits on the ingestion queue: the message serialized as JSON. */
export interface QueueRecord {
  messageId: string;
  body: string;
}

export interface MessageSink {
  /**
   * Hand a message to the ingestion queue. When the message completes a batch
   * the promise settles only after that batch has been processed.
   */
  submit(message: EventMessage): Promise<void>;
}
