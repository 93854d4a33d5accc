import { createId } from "@paralleldrive/cuid2";

import { freezeDeep } from "../../util/freezeDeep.js";
import type { InboundEvent, InboundEventDraft, SecurityEventPayload } from "./eventTypes.js";

/**
 * Stamps a draft with an id and receive time and freezes it.
 */
export function eventBuild<T extends InboundEventDraft>(draft: T, now: number = Date.now()): T & Pick<InboundEvent, "id" | "receivedAt"> {
    return freezeDeep({ ...draft, id: createId(), receivedAt: now });
}

export function securityEventBuild(
    source: InboundEventDraft["source"],
    payload: SecurityEventPayload
): Extract<InboundEvent, { type: "security-event" }> {
    return eventBuild({ type: "security-event", source, target: null, payload });
}
