import { getLogger } from "../../log.js";
import { idKey } from "../ids/idFormat.js";
import type { MeetingId, ParticipantId } from "../ids/idTypes.js";
import type { EngineEvent, EngineEventBus } from "../ipc/events.js";
import { messageBatchFormat } from "../messages/messageFormat.js";
import type { Message } from "../messages/messageTypes.js";

const logger = getLogger("engine.transcripts");

export type TranscriptEntry = {
    recipientId: ParticipantId;
    message: Message;
    deliveredAt: number;
};

export type TranscriptStreamEntry = {
    recipientId: ParticipantId;
    streamId: string;
    content: string;
    completedAt: number;
};

export type TranscriptRecorderOptions = {
    eventBus: EngineEventBus;
    /** Restricts recording to one viewer; null records everyone. */
    recipientId?: ParticipantId | null;
};

/**
 * Event bus observer that keeps what each participant received, the streams each one watched complete,
 * and what was said in each meeting.
 * Lives only in memory; a persistent audit log would subscribe the same way.
 */
export class TranscriptRecorder {
    private readonly eventBus: EngineEventBus;
    private readonly recipientId: ParticipantId | null;
    private readonly delivered = new Map<string, TranscriptEntry[]>();
    private readonly streams = new Map<string, TranscriptStreamEntry[]>();
    private readonly meetings = new Map<string, Message[]>();
    private unsubscribe: (() => void) | null = null;

    constructor(options: TranscriptRecorderOptions) {
        this.eventBus = options.eventBus;
        this.recipientId = options.recipientId ?? null;
    }

    start(): void {
        if (this.unsubscribe) {
            return;
        }
        const filter = this.recipientId
            ? { recipientId: this.recipientId, types: ["message.delivered", "stream.completed"] as const }
            : { types: ["message.delivered", "message.sent", "stream.completed"] as const };
        this.unsubscribe = this.eventBus.onEvent((event) => this.record(event), filter);
        logger.debug({ scoped: this.recipientId !== null }, "start: Transcript recorder");
    }

    stop(): void {
        this.unsubscribe?.();
        this.unsubscribe = null;
    }

    entries(recipientId: ParticipantId): TranscriptEntry[] {
        return [...(this.delivered.get(idKey(recipientId)) ?? [])];
    }

    streamsCompleted(recipientId: ParticipantId): TranscriptStreamEntry[] {
        return [...(this.streams.get(idKey(recipientId)) ?? [])];
    }

    meetingTranscript(meetingId: MeetingId): Message[] {
        return [...(this.meetings.get(idKey(meetingId)) ?? [])];
    }

    format(recipientId: ParticipantId): string {
        return messageBatchFormat(this.entries(recipientId).map((entry) => entry.message));
    }

    private record(event: EngineEvent): void {
        if (event.type === "message.delivered") {
            const key = idKey(event.payload.recipientId);
            const list = this.delivered.get(key) ?? [];
            list.push({
                recipientId: event.payload.recipientId,
                message: event.payload.message,
                deliveredAt: event.createdAt
            });
            this.delivered.set(key, list);
            return;
        }
        if (event.type === "stream.completed") {
            const recipientIds = this.recipientId ? [this.recipientId] : (event.recipientIds ?? []);
            for (const recipientId of recipientIds) {
                const key = idKey(recipientId);
                const list = this.streams.get(key) ?? [];
                list.push({
                    recipientId,
                    streamId: event.payload.streamId,
                    content: event.payload.content,
                    completedAt: event.createdAt
                });
                this.streams.set(key, list);
            }
            return;
        }
        if (event.type !== "message.sent" || event.payload.message.type !== "meeting_broadcast") {
            return;
        }
        const meetingId = event.payload.message.meetingId;
        if (meetingId) {
            const key = idKey(meetingId);
            const list = this.meetings.get(key) ?? [];
            list.push(event.payload.message);
            this.meetings.set(key, list);
        }
    }
}
