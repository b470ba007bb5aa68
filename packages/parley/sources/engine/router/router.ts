import type { Config } from "../../config/configTypes.js";
import { getLogger } from "../../log.js";
import { setAddBounded } from "../../util/setAddBounded.js";
import { Channel } from "../channels/channel.js";
import { channelIdDirect, channelIdMeeting } from "../channels/channelIdBuild.js";
import type { ChannelDeliveryReport } from "../channels/channelTypes.js";
import { MeetingEndedError } from "../errors/meetingEndedError.js";
import { StreamProtocolError } from "../errors/streamProtocolError.js";
import { UnknownRecipientError } from "../errors/unknownRecipientError.js";
import { idEquals, idFormat, idKey } from "../ids/idFormat.js";
import { type EntityId, type MeetingId, meetingId, type ParticipantId } from "../ids/idTypes.js";
import type { EngineEventBus } from "../ipc/events.js";
import type { Meeting } from "../meetings/meeting.js";
import { messageBuild } from "../messages/messageBuild.js";
import type { Message, MessagePredicate } from "../messages/messageTypes.js";
import type { Participant } from "../participants/participantTypes.js";
import { queueWaitWindowResolve } from "../queue/queueWaitWindowResolve.js";
import { STREAMS_COMPLETED_LIMIT, type StreamCompleteResult, type StreamStartResult } from "../streams/streamTypes.js";

const logger = getLogger("engine.router");

export type RouterOptions = {
    eventBus: EngineEventBus;
    config: Config;
};

export type RouterSendInput = {
    senderId: ParticipantId;
    recipientId: ParticipantId;
    content: string;
};

export type RouterSendResult = {
    message: Message;
    report: ChannelDeliveryReport;
};

export type RouterStreamStartInput = {
    senderId: ParticipantId;
    recipientId: ParticipantId | MeetingId;
    targetIds?: readonly ParticipantId[] | null;
};

/**
 * Registry of participants, channels and meetings. Resolves addresses and owns the
 * single instance of every channel.
 */
export class Router {
    private readonly eventBus: EngineEventBus;
    private readonly config: Config;
    private readonly participants = new Map<string, Participant>();
    private readonly channels = new Map<string, Channel>();
    private readonly meetings = new Map<string, Meeting>();
    private readonly streamChannels = new Map<string, Channel>();
    private readonly streamsCompleted = new Set<string>();
    private nextMeetingId: number;

    constructor(options: RouterOptions) {
        this.eventBus = options.eventBus;
        this.config = options.config;
        this.nextMeetingId = options.config.meetings.idStart;
    }

    participantRegister(participant: Participant): void {
        const key = idKey(participant.id);
        if (this.participants.has(key)) {
            throw new Error(`Participant ${idFormat(participant.id)} is already registered`);
        }
        this.participants.set(key, participant);
        logger.debug({ participant: idFormat(participant.id), name: participant.name }, "register: Participant");
    }

    participantGet(participantId: ParticipantId): Participant | null {
        return this.participants.get(idKey(participantId)) ?? null;
    }

    participantRequire(participantId: ParticipantId): Participant {
        const participant = this.participantGet(participantId);
        if (!participant) {
            throw new UnknownRecipientError(participantId);
        }
        return participant;
    }

    participantsList(): Participant[] {
        return Array.from(this.participants.values());
    }

    /**
     * Returns the one 1:1 channel for a pair, creating it on first use.
     * Runs without awaiting, so concurrent callers can never race two instances into existence.
     */
    channelGetOrCreate(participantIds: readonly ParticipantId[]): Channel {
        const channelId = channelIdDirect(participantIds);
        const existing = this.channels.get(channelId);
        if (existing) {
            return existing;
        }
        const participants = participantIds.map((id) => this.participantRequire(id));
        const channel = new Channel({ id: channelId, kind: "direct", participants, eventBus: this.eventBus });
        this.channelAdd(channel);
        return channel;
    }

    meetingChannelGetOrCreate(id: MeetingId, participants: readonly Participant[] = []): Channel {
        const channelId = channelIdMeeting(id);
        const existing = this.channels.get(channelId);
        if (existing) {
            return existing;
        }
        const channel = new Channel({
            id: channelId,
            kind: "meeting",
            meetingId: id,
            participants,
            eventBus: this.eventBus
        });
        this.channelAdd(channel);
        return channel;
    }

    channelGet(channelId: string): Channel | null {
        return this.channels.get(channelId) ?? null;
    }

    channelsList(): Channel[] {
        return Array.from(this.channels.values());
    }

    /**
     * Allocates the next sequential meeting id and stores the meeting the factory builds for it.
     */
    meetingRegister(factory: (id: MeetingId) => Meeting): Meeting {
        const id = meetingId(String(this.nextMeetingId));
        this.nextMeetingId += 1;
        const meeting = factory(id);
        this.meetings.set(idKey(id), meeting);
        return meeting;
    }

    meetingGet(id: MeetingId): Meeting | null {
        return this.meetings.get(idKey(id)) ?? null;
    }

    meetingRequire(id: MeetingId): Meeting {
        const meeting = this.meetingGet(id);
        if (!meeting) {
            throw new UnknownRecipientError(id);
        }
        return meeting;
    }

    meetingsList(): Meeting[] {
        return Array.from(this.meetings.values());
    }

    async send(input: RouterSendInput): Promise<RouterSendResult> {
        if (input.content.trim().length === 0) {
            throw new Error("Message content cannot be empty.");
        }
        const sender = this.participantRequire(input.senderId);
        this.participantRequire(input.recipientId);
        const channel = this.channelGetOrCreate([input.senderId, input.recipientId]);
        const message = messageBuild({
            type: "direct",
            senderId: sender.id,
            senderName: sender.name,
            recipientId: input.recipientId,
            content: input.content
        });
        const report = await channel.send(message, sender.id);
        return { message, report };
    }

    /**
     * Blocks until traffic from source arrives for the participant, or the timeout passes.
     * Meeting invitations always match. For a meeting source, traffic is collected over a window
     * chosen by queueWaitWindowResolve so bursts arrive as one batch.
     */
    async waitForMessages(
        participantId: ParticipantId,
        source: EntityId | null,
        timeoutMs: number = this.config.waits.defaultTimeoutMs
    ): Promise<Message[]> {
        const participant = this.participantRequire(participantId);
        const inbox = participant.inbox;
        const predicate = this.sourcePredicate(source);

        if (!source || source.kind !== "meeting") {
            return inbox.getBatch({ predicate, timeoutMs });
        }

        const deadline = Date.now() + Math.max(0, timeoutMs);
        const arrived = await inbox.waitFor(predicate, timeoutMs);
        if (!arrived) {
            return inbox.take(predicate);
        }
        const collectStart = Date.now();
        while (true) {
            const window = queueWaitWindowResolve(inbox.peek(predicate), participant, this.config.waits);
            const remaining = Math.min(collectStart + window, deadline) - Date.now();
            if (remaining <= 0 || inbox.isClosed()) {
                break;
            }
            await inbox.waitForChange(remaining);
        }
        return inbox.take(predicate);
    }

    streamStart(input: RouterStreamStartInput): StreamStartResult {
        const sender = this.participantRequire(input.senderId);
        const target = input.recipientId;
        let channel: Channel;
        if (target.kind === "meeting") {
            const meeting = this.meetingRequire(target);
            if (meeting.isEnded()) {
                throw new MeetingEndedError(meeting.id, "start stream");
            }
            if (!meeting.isMember(sender.id)) {
                throw new Error(`${idFormat(sender.id)} is not a member of ${idFormat(meeting.id)}`);
            }
            channel = this.meetingChannelGetOrCreate(meeting.id);
        } else {
            channel = this.channelGetOrCreate([sender.id, target]);
        }

        const result = channel.streamStart({
            senderId: sender.id,
            senderName: sender.name,
            recipientId: target.kind === "meeting" ? null : target,
            meetingId: target.kind === "meeting" ? target : null,
            targetIds: input.targetIds ?? null
        });
        this.streamChannels.set(result.streamId, channel);
        logger.debug(
            { streamId: result.streamId, channelId: channel.id, started: result.started },
            "event: Stream opened"
        );
        return result;
    }

    streamChunk(streamId: string, chunk: string): void {
        const channel = this.streamChannelRequire(streamId, "stream");
        channel.streamChunk(streamId, chunk);
    }

    /**
     * Completes a stream. Meeting streams land in the meeting history like any broadcast.
     */
    async streamComplete(streamId: string, finalContent?: string): Promise<StreamCompleteResult> {
        const channel = this.streamChannelRequire(streamId, "complete stream");
        const result = await channel.streamComplete(streamId, finalContent);
        this.streamChannels.delete(streamId);
        setAddBounded(this.streamsCompleted, streamId, STREAMS_COMPLETED_LIMIT);
        const meeting = channel.meetingId ? this.meetingGet(channel.meetingId) : null;
        if (meeting) {
            meeting.historyAppend(result.message);
        }
        return result;
    }

    private streamChannelRequire(streamId: string, operation: string): Channel {
        const channel = this.streamChannels.get(streamId);
        if (!channel) {
            throw new StreamProtocolError(
                streamId,
                this.streamsCompleted.has(streamId) ? "stream_completed" : "unknown_stream"
            );
        }
        const meeting = channel.meetingId ? this.meetingGet(channel.meetingId) : null;
        if (meeting && meeting.isEnded() && channel.streamIsOpen(streamId)) {
            throw new MeetingEndedError(meeting.id, operation);
        }
        return channel;
    }

    private channelAdd(channel: Channel): void {
        this.channels.set(channel.id, channel);
        this.eventBus.emit({
            type: "channel.created",
            payload: {
                channelId: channel.id,
                kind: channel.kind,
                meetingId: channel.meetingId,
                participantIds: channel.participantsList().map((participant) => participant.id)
            }
        });
        logger.debug({ channelId: channel.id, kind: channel.kind }, "event: Channel created");
    }

    private sourcePredicate(source: EntityId | null): MessagePredicate {
        if (!source) {
            return () => true;
        }
        if (source.kind === "meeting") {
            this.meetingRequire(source);
            return (message) =>
                message.type === "meeting_invitation" ||
                (message.meetingId !== null && idEquals(message.meetingId, source));
        }
        this.participantRequire(source);
        return (message) =>
            message.type === "meeting_invitation" || (message.meetingId === null && idEquals(message.senderId, source));
    }
}
