import type { ParticipantId } from "../ids/idTypes.js";
import type { Message } from "../messages/messageTypes.js";
import type { MessageQueue } from "../queue/messageQueue.js";

export type ParticipantDeliveryResult = "delivered" | "skipped";

export type ParticipantCapabilities = {
    /** Whether the participant can display content as it is produced. */
    streaming: boolean;
};

export type HumanMeetingNotifications = "all" | "targeted" | "none";

export type HumanDeliveryPreferences = {
    streamingEnabled: boolean;
    meetingNotifications: HumanMeetingNotifications;
};

/**
 * Anything that can receive messages. A participant may decline a delivery by returning "skipped";
 * a thrown error is reported as a delivery failure for that participant only.
 */
export interface Participant {
    readonly id: ParticipantId;
    readonly name: string;
    readonly capabilities: ParticipantCapabilities;
    readonly inbox: MessageQueue;
    deliver(message: Message): Promise<ParticipantDeliveryResult>;
}
