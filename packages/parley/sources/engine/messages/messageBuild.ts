import { createId } from "@paralleldrive/cuid2";

import { freezeDeep } from "../../util/freezeDeep.js";
import type { Message, MessageBuildInput } from "./messageTypes.js";

/**
 * Builds an immutable message with a fresh id and creation time.
 * Expects: direct and invitation traffic names a recipient; meeting traffic names a meeting.
 */
export function messageBuild(input: MessageBuildInput): Message {
    const recipientId = input.recipientId ?? null;
    const meetingId = input.meetingId ?? null;

    if (input.type === "meeting_broadcast") {
        if (!meetingId) {
            throw new Error("Meeting broadcast requires a meeting id.");
        }
    } else if (!recipientId) {
        throw new Error(`Message of type ${input.type} requires a recipient.`);
    }
    if ((input.type === "meeting_invitation" || input.type === "meeting_invitation_response") && !meetingId) {
        throw new Error(`Message of type ${input.type} requires a meeting id.`);
    }

    const message: Message = {
        id: createId(),
        type: input.type,
        senderId: input.senderId,
        senderName: input.senderName,
        recipientId,
        meetingId,
        targetIds: input.targetIds ? [...input.targetIds] : null,
        content: input.content,
        streamId: input.streamId ?? null,
        createdAt: Date.now()
    };
    return freezeDeep(message);
}
