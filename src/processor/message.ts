import { z } from "zod";
import { MalformedMessageError, errorMessage } from "../lib/errors.ts";
import type { EventMessage } from "../mapping/types.ts";
import type { QueueRecord } from "../webhook/types.ts";

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

const messageSchema = z.object({
  event_type: z.string().min(1),
  action: optionalText,
  delivery_id: optionalText,
  payload: z.record(z.unknown()),
});

/**
 * Decode a queue record body into an event message.
 *
 * @throws MalformedMessageError when the body is not JSON or lacks
 *   event_type / payload
 */
export function parseQueueRecord(record: QueueRecord): EventMessage {
  let body: unknown;
  try {
    body = JSON.parse(record.body);
  } catch (err) {
    throw new MalformedMessageError(`Record ${record.messageId} body is not valid JSON: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const result = messageSchema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
      .join("; ");
    throw new MalformedMessageError(`Record ${record.messageId} is not an event message: ${issues}`);
  }

  return {
    eventType: result.data.event_type,
    action: result.data.action,
    deliveryId: result.data.delivery_id,
    payload: result.data.payload,
  };
}

export function toQueueRecord(message: EventMessage, messageId: string = message.deliveryId): QueueRecord {
  return {
    messageId,
    body: JSON.stringify({
      event_type: message.eventType,
      action: message.action,
      delivery_id: message.deliveryId,
      payload: message.payload,
    }),
  };
}
