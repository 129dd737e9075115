import type { Logger } from "pino";
import { listSubscriptions } from "../mapping/config.ts";
import type { MappingConfig } from "../mapping/types.ts";
import type { EventFilter } from "./types.ts";

/**
 * Creates a filter that only lets through deliveries some mapping rule could
 * match on event type and action. Everything else is acknowledged and dropped
 * at the edge instead of travelling through the queue to resolve to nothing.
 *
 * Repository, branch and file patterns are not checked here; they need the
 * normalized event and belong to the resolver.
 */
export function createEventFilter(config: MappingConfig, logger: Logger): EventFilter {
  const subscriptions = listSubscriptions(config);

  return {
    shouldQueue(eventName: string, action: string): boolean {
      if (!subscriptions.has(eventName)) {
        logger.debug({ eventName, action }, "Filtered: no mapping rule for event type");
        return false;
      }

      const actions = subscriptions.get(eventName);
      if (actions === undefined || actions.has(action)) {
        return true;
      }

      logger.debug(
        { eventName, action, subscribedActions: [...actions] },
        "Filtered: action not subscribed by any mapping rule",
      );
      return false;
    },
  };
}
