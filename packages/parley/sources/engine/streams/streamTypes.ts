import type { ChannelDeliveryReport } from "../channels/channelTypes.js";
import type { MeetingId, ParticipantId } from "../ids/idTypes.js";
import type { Message } from "../messages/messageTypes.js";

/**
 * started=false means no recipient can display incremental content; chunks are buffered silently
 * and completion delivers one ordinary message.
 */
/** How many completed stream ids are remembered to tell a late chunk from an unknown stream. */
export const STREAMS_COMPLETED_LIMIT = 256;

export type StreamStartResult =
    | { started: true; streamId: string; recipientIds: ParticipantId[] }
    | { started: false; streamId: string; reason: "no_streaming_recipient" };

export type StreamStartInput = {
    senderId: ParticipantId;
    senderName: string;
    recipientId: ParticipantId | null;
    meetingId: MeetingId | null;
    targetIds?: readonly ParticipantId[] | null;
};

export type StreamCompleteResult = {
    started: boolean;
    message: Message;
    report: ChannelDeliveryReport;
};

export type StreamStartEvent = {
    streamId: string;
    channelId: string;
    senderId: ParticipantId;
    senderName: string;
    recipientId: ParticipantId | null;
    meetingId: MeetingId | null;
};

export type StreamChunkEvent = {
    streamId: string;
    chunk: string;
};

export type StreamCompleteEvent = {
    streamId: string;
    content: string;
    message: Message;
};
