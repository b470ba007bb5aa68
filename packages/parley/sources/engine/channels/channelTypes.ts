import type { DeliveryFailureError } from "../errors/deliveryFailureError.js";
import type { ParticipantId } from "../ids/idTypes.js";

export type ChannelKind = "direct" | "meeting";

export type ChannelDeliveryFailure = {
    recipientId: ParticipantId;
    error: DeliveryFailureError;
};

/**
 * Outcome of one fan-out. A non-empty failed list is a partial failure; sibling deliveries still happened.
 */
export type ChannelDeliveryReport = {
    channelId: string;
    messageId: string;
    delivered: ParticipantId[];
    skipped: ParticipantId[];
    failed: ChannelDeliveryFailure[];
};

export type ChannelSendOptions = {
    /** Participants left out of this fan-out in addition to the sender. */
    exclude?: readonly ParticipantId[];
};
