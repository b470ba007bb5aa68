import { createId } from "@paralleldrive/cuid2";

import { getLogger } from "../../log.js";
import { setAddBounded } from "../../util/setAddBounded.js";
import { DeliveryFailureError } from "../errors/deliveryFailureError.js";
import { StreamProtocolError } from "../errors/streamProtocolError.js";
import { idEquals, idFormat, idKey } from "../ids/idFormat.js";
import type { MeetingId, ParticipantId } from "../ids/idTypes.js";
import type { EngineEventBus } from "../ipc/events.js";
import { messageBuild } from "../messages/messageBuild.js";
import type { Message } from "../messages/messageTypes.js";
import type { Participant } from "../participants/participantTypes.js";
import {
    STREAMS_COMPLETED_LIMIT,
    type StreamCompleteResult,
    type StreamStartInput,
    type StreamStartResult
} from "../streams/streamTypes.js";
import type { ChannelDeliveryReport, ChannelKind, ChannelSendOptions } from "./channelTypes.js";

const logger = getLogger("engine.channel");

export type ChannelOptions = {
    id: string;
    kind: ChannelKind;
    meetingId?: MeetingId | null;
    participants: readonly Participant[];
    eventBus: EngineEventBus;
};

type ChannelStream = {
    input: StreamStartInput;
    started: boolean;
    recipientIds: ParticipantId[];
    chunks: string[];
};

/**
 * A membership set plus delivery. Fans a message out to every member except the sender,
 * one recipient at a time, and reports per-recipient outcomes.
 */
export class Channel {
    readonly id: string;
    readonly kind: ChannelKind;
    readonly meetingId: MeetingId | null;
    private readonly eventBus: EngineEventBus;
    private readonly participants = new Map<string, Participant>();
    private readonly streams = new Map<string, ChannelStream>();
    private readonly completedStreams = new Set<string>();

    constructor(options: ChannelOptions) {
        this.id = options.id;
        this.kind = options.kind;
        this.meetingId = options.meetingId ?? null;
        this.eventBus = options.eventBus;
        for (const participant of options.participants) {
            this.participants.set(idKey(participant.id), participant);
        }
    }

    participantsList(): Participant[] {
        return Array.from(this.participants.values());
    }

    participantHas(participantId: ParticipantId): boolean {
        return this.participants.has(idKey(participantId));
    }

    participantAdd(participant: Participant): boolean {
        const key = idKey(participant.id);
        if (this.participants.has(key)) {
            return false;
        }
        this.participants.set(key, participant);
        return true;
    }

    participantRemove(participantId: ParticipantId): boolean {
        return this.participants.delete(idKey(participantId));
    }

    async send(
        message: Message,
        senderId: ParticipantId,
        options: ChannelSendOptions = {}
    ): Promise<ChannelDeliveryReport> {
        const exclude = options.exclude ?? [];
        const recipients = this.participantsList().filter(
            (participant) =>
                !idEquals(participant.id, senderId) && !exclude.some((id) => idEquals(id, participant.id))
        );
        const report: ChannelDeliveryReport = {
            channelId: this.id,
            messageId: message.id,
            delivered: [],
            skipped: [],
            failed: []
        };
        this.eventBus.emit({ type: "message.sent", payload: { channelId: this.id, message } });

        for (const recipient of recipients) {
            try {
                const outcome = await recipient.deliver(message);
                if (outcome === "skipped") {
                    report.skipped.push(recipient.id);
                    this.eventBus.emit(
                        {
                            type: "message.skipped",
                            payload: { channelId: this.id, messageId: message.id, recipientId: recipient.id }
                        },
                        [recipient.id]
                    );
                    continue;
                }
                report.delivered.push(recipient.id);
                this.eventBus.emit(
                    { type: "message.delivered", payload: { channelId: this.id, message, recipientId: recipient.id } },
                    [recipient.id]
                );
            } catch (cause) {
                const error = new DeliveryFailureError(recipient.id, message.id, cause);
                report.failed.push({ recipientId: recipient.id, error });
                logger.warn(
                    { channelId: this.id, recipient: idFormat(recipient.id), messageId: message.id, error },
                    "error: Delivery failed"
                );
                this.eventBus.emit({
                    type: "message.delivery_failed",
                    payload: {
                        channelId: this.id,
                        messageId: message.id,
                        recipientId: recipient.id,
                        error: error.message
                    }
                });
            }
        }

        logger.debug(
            {
                channelId: this.id,
                messageId: message.id,
                delivered: report.delivered.length,
                skipped: report.skipped.length,
                failed: report.failed.length
            },
            "event: Message routed"
        );
        return report;
    }

    /**
     * Opens a stream. Incremental events go only to recipients that can display them; when none can,
     * chunks are buffered and completion delivers a single message.
     */
    streamStart(input: StreamStartInput): StreamStartResult {
        const streamId = createId();
        const recipientIds = this.participantsList()
            .filter((participant) => !idEquals(participant.id, input.senderId) && participant.capabilities.streaming)
            .map((participant) => participant.id);
        const started = recipientIds.length > 0;
        this.streams.set(streamId, { input, started, recipientIds, chunks: [] });

        if (!started) {
            logger.debug({ channelId: this.id, streamId }, "event: Stream degraded to single message");
            return { started: false, streamId, reason: "no_streaming_recipient" };
        }
        this.eventBus.emit(
            {
                type: "stream.started",
                payload: {
                    streamId,
                    channelId: this.id,
                    senderId: input.senderId,
                    senderName: input.senderName,
                    recipientId: input.recipientId,
                    meetingId: input.meetingId
                }
            },
            recipientIds
        );
        return { started: true, streamId, recipientIds: [...recipientIds] };
    }

    streamChunk(streamId: string, chunk: string): void {
        const stream = this.streamRequire(streamId);
        stream.chunks.push(chunk);
        if (stream.started) {
            this.eventBus.emit({ type: "stream.chunk", payload: { streamId, chunk } }, stream.recipientIds);
        }
    }

    /**
     * Closes a stream and delivers the accumulated content as one ordinary message.
     * Expects: finalContent, when given, replaces the accumulated chunks.
     */
    async streamComplete(streamId: string, finalContent?: string): Promise<StreamCompleteResult> {
        const stream = this.streamRequire(streamId);
        this.streams.delete(streamId);
        setAddBounded(this.completedStreams, streamId, STREAMS_COMPLETED_LIMIT);

        const content = finalContent ?? stream.chunks.join("");
        const message = messageBuild({
            type: this.kind === "meeting" ? "meeting_broadcast" : "direct",
            senderId: stream.input.senderId,
            senderName: stream.input.senderName,
            recipientId: this.kind === "meeting" ? null : stream.input.recipientId,
            meetingId: stream.input.meetingId,
            targetIds: stream.input.targetIds ?? null,
            content,
            streamId
        });
        if (stream.started) {
            this.eventBus.emit({ type: "stream.completed", payload: { streamId, content, message } }, stream.recipientIds);
        }
        const report = await this.send(message, stream.input.senderId);
        return { started: stream.started, message, report };
    }

    streamIsOpen(streamId: string): boolean {
        return this.streams.has(streamId);
    }

    private streamRequire(streamId: string): ChannelStream {
        const stream = this.streams.get(streamId);
        if (stream) {
            return stream;
        }
        throw new StreamProtocolError(
            streamId,
            this.completedStreams.has(streamId) ? "stream_completed" : "unknown_stream"
        );
    }
}
