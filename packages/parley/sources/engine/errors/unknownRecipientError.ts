import { idFormat } from "../ids/idFormat.js";
import type { EntityId } from "../ids/idTypes.js";

/**
 * Raised at routing time when a recipient does not resolve to a registered participant or meeting.
 * Expects: callers surface this to the sender instead of picking a fallback recipient.
 */
export class UnknownRecipientError extends Error {
    readonly recipientId: EntityId;

    constructor(recipientId: EntityId) {
        super(`Unknown recipient: ${idFormat(recipientId)}`);
        this.name = "UnknownRecipientError";
        this.recipientId = recipientId;
    }
}
