import { idKey } from "../ids/idFormat.js";
import type { AgentId } from "../ids/idTypes.js";
import type { Message } from "../messages/messageTypes.js";
import { MessageQueue } from "../queue/messageQueue.js";
import type { Participant, ParticipantCapabilities, ParticipantDeliveryResult } from "./participantTypes.js";

export type AgentParticipantOptions = {
    id: AgentId;
    name: string;
    streaming?: boolean;
};

export class AgentParticipant implements Participant {
    readonly id: AgentId;
    readonly name: string;
    readonly capabilities: ParticipantCapabilities;
    readonly inbox: MessageQueue;

    constructor(options: AgentParticipantOptions) {
        this.id = options.id;
        this.name = options.name;
        this.capabilities = { streaming: options.streaming ?? false };
        this.inbox = new MessageQueue(idKey(options.id));
    }

    async deliver(message: Message): Promise<ParticipantDeliveryResult> {
        this.inbox.put(message);
        return "delivered";
    }
}
