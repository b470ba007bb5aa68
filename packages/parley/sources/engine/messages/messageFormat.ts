import { idFormat } from "../ids/idFormat.js";
import type { Message } from "./messageTypes.js";

const TYPE_LABELS: Record<Message["type"], string> = {
    direct: "",
    meeting_broadcast: "",
    meeting_invitation: "[MEETING INVITATION] ",
    meeting_invitation_response: "[MEETING INVITATION RESPONSE] "
};

/**
 * Renders a delivered message as one line for the interpreter.
 */
export function messageFormat(message: Message): string {
    const sender = `${message.senderName}(${idFormat(message.senderId)})`;
    const recipient = message.recipientId ? ` to ${idFormat(message.recipientId)}` : "";
    const meeting = message.meetingId ? ` in ${idFormat(message.meetingId)}` : "";
    const targets =
        message.targetIds && message.targetIds.length > 0
            ? ` [to ${message.targetIds.map((id) => idFormat(id)).join(", ")}]`
            : "";
    return `${TYPE_LABELS[message.type]}Message from ${sender}${recipient}${meeting}${targets}: ${message.content}`;
}

export function messageBatchFormat(messages: readonly Message[]): string {
    if (messages.length === 0) {
        return "No messages";
    }
    return messages.map((message) => messageFormat(message)).join("\n");
}
