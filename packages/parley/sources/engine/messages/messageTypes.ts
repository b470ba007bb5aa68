import type { MeetingId, ParticipantId } from "../ids/idTypes.js";

export type MessageType = "direct" | "meeting_broadcast" | "meeting_invitation" | "meeting_invitation_response";

/**
 * One unit of communication. Frozen at construction and never edited afterwards.
 */
export type Message = {
    readonly id: string;
    readonly type: MessageType;
    readonly senderId: ParticipantId;
    readonly senderName: string;
    readonly recipientId: ParticipantId | null;
    readonly meetingId: MeetingId | null;
    readonly targetIds: readonly ParticipantId[] | null;
    readonly content: string;
    readonly streamId: string | null;
    readonly createdAt: number;
};

export type MessageBuildInput = {
    type: MessageType;
    senderId: ParticipantId;
    senderName: string;
    recipientId?: ParticipantId | null;
    meetingId?: MeetingId | null;
    targetIds?: readonly ParticipantId[] | null;
    content: string;
    streamId?: string | null;
};

export type MessagePredicate = (message: Message) => boolean;
