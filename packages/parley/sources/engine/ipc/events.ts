import { getLogger } from "../../log.js";
import type { ChannelKind } from "../channels/channelTypes.js";
import { idEquals } from "../ids/idFormat.js";
import type { MeetingId, ParticipantId } from "../ids/idTypes.js";
import type {
    MeetingInvitation,
    MeetingRejectReason,
    MeetingSnapshot
} from "../meetings/meetingTypes.js";
import type { Message } from "../messages/messageTypes.js";
import type { StreamChunkEvent, StreamCompleteEvent, StreamStartEvent } from "../streams/streamTypes.js";

const logger = getLogger("engine.events");

export type EngineEventMap = {
    "channel.created": {
        channelId: string;
        kind: ChannelKind;
        meetingId: MeetingId | null;
        participantIds: ParticipantId[];
    };
    "message.sent": { channelId: string; message: Message };
    "message.delivered": { channelId: string; message: Message; recipientId: ParticipantId };
    "message.skipped": { channelId: string; messageId: string; recipientId: ParticipantId };
    "message.delivery_failed": {
        channelId: string;
        messageId: string;
        recipientId: ParticipantId;
        error: string;
    };
    "stream.started": StreamStartEvent;
    "stream.chunk": StreamChunkEvent;
    "stream.completed": StreamCompleteEvent;
    "meeting.created": { meeting: MeetingSnapshot };
    "meeting.invited": { meetingId: MeetingId; invitation: MeetingInvitation };
    "meeting.joined": { meetingId: MeetingId; participantId: ParticipantId };
    "meeting.rejected": { meetingId: MeetingId; participantId: ParticipantId; reason: MeetingRejectReason };
    "meeting.started": { meeting: MeetingSnapshot };
    "meeting.left": { meetingId: MeetingId; participantId: ParticipantId };
    "meeting.confirmation_requested": { meetingId: MeetingId; participantId: ParticipantId };
    "meeting.ended": { meetingId: MeetingId; endedBy: ParticipantId | null };
    "meeting.state_updated": {
        meetingId: MeetingId;
        key: string;
        value: unknown;
        updatedBy: ParticipantId;
    };
};

export type EngineEventType = keyof EngineEventMap;

export type EngineEventBody = {
    [K in EngineEventType]: { type: K; payload: EngineEventMap[K] };
}[EngineEventType];

/**
 * recipientIds=null marks an event for unfiltered observers only.
 */
export type EngineEvent = EngineEventBody & {
    recipientIds: readonly ParticipantId[] | null;
    createdAt: number;
};

export type EngineEventListener = (event: EngineEvent) => void | Promise<void>;

export type EngineEventFilter = {
    recipientId?: ParticipantId;
    types?: readonly EngineEventType[];
};

type EngineEventSubscription = {
    listener: EngineEventListener;
    filter: EngineEventFilter;
};

/**
 * In-process pub/sub for engine notifications.
 * A listener that throws or rejects is logged and never affects its siblings or the emitter.
 */
export class EngineEventBus {
    private readonly subscriptions = new Set<EngineEventSubscription>();

    emit(body: EngineEventBody, recipientIds: readonly ParticipantId[] | null = null): EngineEvent {
        const event: EngineEvent = { ...body, recipientIds, createdAt: Date.now() };
        for (const subscription of [...this.subscriptions]) {
            if (!eventMatches(event, subscription.filter)) {
                continue;
            }
            this.dispatch(subscription, event);
        }
        return event;
    }

    onEvent(listener: EngineEventListener, filter: EngineEventFilter = {}): () => void {
        const subscription: EngineEventSubscription = { listener, filter };
        this.subscriptions.add(subscription);
        return () => {
            this.subscriptions.delete(subscription);
        };
    }

    listenerCount(): number {
        return this.subscriptions.size;
    }

    private dispatch(subscription: EngineEventSubscription, event: EngineEvent): void {
        let result: void | Promise<void>;
        try {
            result = subscription.listener(event);
        } catch (error) {
            logger.warn({ eventType: event.type, error }, "error: Event listener failed");
            return;
        }
        if (result instanceof Promise) {
            void result.catch((error: unknown) => {
                logger.warn({ eventType: event.type, error }, "error: Event listener rejected");
            });
        }
    }
}

function eventMatches(event: EngineEvent, filter: EngineEventFilter): boolean {
    if (filter.types && !filter.types.includes(event.type)) {
        return false;
    }
    const recipientId = filter.recipientId;
    if (!recipientId) {
        return true;
    }
    if (!event.recipientIds) {
        return false;
    }
    return event.recipientIds.some((id) => idEquals(id, recipientId));
}
