import { idKey } from "../ids/idFormat.js";
import type { HumanRef } from "../ids/idTypes.js";
import { messageTargetsParticipant } from "../messages/messageTargets.js";
import type { Message } from "../messages/messageTypes.js";
import { MessageQueue } from "../queue/messageQueue.js";
import type {
    HumanDeliveryPreferences,
    Participant,
    ParticipantCapabilities,
    ParticipantDeliveryResult
} from "./participantTypes.js";

export type HumanParticipantListener = (message: Message) => void | Promise<void>;

export type HumanParticipantOptions = {
    id: HumanRef;
    name?: string;
    preferences?: Partial<HumanDeliveryPreferences>;
    /** Receives every accepted message before it is buffered in the inbox. */
    listener?: HumanParticipantListener;
};

export const HUMAN_DELIVERY_DEFAULTS: HumanDeliveryPreferences = {
    streamingEnabled: true,
    meetingNotifications: "all"
};

/**
 * A person at the edge of the system. Meeting chatter is filtered by notification preference;
 * invitations and direct messages always get through.
 */
export class HumanParticipant implements Participant {
    readonly id: HumanRef;
    readonly name: string;
    readonly inbox: MessageQueue;
    private preferences: HumanDeliveryPreferences;
    private readonly listener: HumanParticipantListener | null;

    constructor(options: HumanParticipantOptions) {
        this.id = options.id;
        this.name = options.name ?? "Human";
        this.preferences = { ...HUMAN_DELIVERY_DEFAULTS, ...options.preferences };
        this.listener = options.listener ?? null;
        this.inbox = new MessageQueue(idKey(options.id));
    }

    get capabilities(): ParticipantCapabilities {
        return { streaming: this.preferences.streamingEnabled };
    }

    preferencesGet(): HumanDeliveryPreferences {
        return { ...this.preferences };
    }

    preferencesUpdate(update: Partial<HumanDeliveryPreferences>): HumanDeliveryPreferences {
        this.preferences = { ...this.preferences, ...update };
        return this.preferencesGet();
    }

    async deliver(message: Message): Promise<ParticipantDeliveryResult> {
        if (!this.accepts(message)) {
            return "skipped";
        }
        if (this.listener) {
            await this.listener(message);
        }
        this.inbox.put(message);
        return "delivered";
    }

    private accepts(message: Message): boolean {
        if (message.type !== "meeting_broadcast") {
            return true;
        }
        switch (this.preferences.meetingNotifications) {
            case "all":
                return true;
            case "none":
                return false;
            case "targeted":
                return messageTargetsParticipant(message, this);
        }
    }
}
