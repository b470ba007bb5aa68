import { idFormat } from "../ids/idFormat.js";
import type { ParticipantId } from "../ids/idTypes.js";

/**
 * Wraps a single recipient's delivery failure inside a fan-out.
 * Expects: never thrown out of a channel send; reported in the delivery result instead.
 */
export class DeliveryFailureError extends Error {
    readonly recipientId: ParticipantId;
    readonly messageId: string;

    constructor(recipientId: ParticipantId, messageId: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Delivery of ${messageId} to ${idFormat(recipientId)} failed: ${reason}`, { cause });
        this.name = "DeliveryFailureError";
        this.recipientId = recipientId;
        this.messageId = messageId;
    }
}
