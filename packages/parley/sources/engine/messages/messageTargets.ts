import { idEquals, idFormat } from "../ids/idFormat.js";
import type { ParticipantId } from "../ids/idTypes.js";
import type { Message } from "./messageTypes.js";

export type MessageTargetCandidate = {
    id: ParticipantId;
    name: string;
};

/**
 * Tells whether a message is addressed to a participant.
 * The explicit target list decides when present; otherwise the content is scanned for the
 * participant's name or formatted id, which can false-positive.
 */
export function messageTargetsParticipant(message: Message, participant: MessageTargetCandidate): boolean {
    if (message.recipientId && idEquals(message.recipientId, participant.id)) {
        return true;
    }
    if (message.targetIds) {
        return message.targetIds.some((targetId) => idEquals(targetId, participant.id));
    }
    return messageMentions(message.content, participant);
}

export function messageIsFromHuman(message: Message): boolean {
    return message.senderId.kind === "human";
}

function messageMentions(content: string, participant: MessageTargetCandidate): boolean {
    const needles = [participant.name.trim(), idFormat(participant.id)].filter((needle) => needle.length > 0);
    return needles.some((needle) => new RegExp(`(^|\\W)${escapeRegExp(needle)}(?=\\W|$)`, "i").test(content));
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
