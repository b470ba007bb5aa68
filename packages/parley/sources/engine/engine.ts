import type {
    ChannelDeliveryReport,
    Config,
    EngineEventFilter,
    EngineEventListener,
    EngineEventType,
    HumanDeliveryPreferences,
    MeetingEndResult,
    MeetingInviteResult,
    MeetingJoinResult,
    MeetingLeaveResult,
    MeetingRejectReason,
    MeetingRejectResult,
    MeetingSnapshot,
    Message,
    Participant,
    StreamCompleteResult,
    StreamStartResult
} from "@/types";
import { configResolve } from "../config/configResolve.js";
import { getLogger } from "../log.js";
import { idFormat } from "./ids/idFormat.js";
import { idParse, idParseMeeting, idParseParticipant } from "./ids/idParse.js";
import { agentId, humanRef } from "./ids/idTypes.js";
import { EngineEventBus } from "./ipc/events.js";
import { Meetings } from "./meetings/meetings.js";
import { AgentParticipant } from "./participants/agentParticipant.js";
import { HumanParticipant, type HumanParticipantListener } from "./participants/humanParticipant.js";
import { Router } from "./router/router.js";

const logger = getLogger("engine");

export type EngineOptions = {
    /** Raw settings validated by configResolve; ignored when config is given. */
    settings?: unknown;
    config?: Config;
    eventBus?: EngineEventBus;
    /** Registers the default human participant unless false. */
    human?: EngineHumanRegisterInput | false;
};

export type EngineAgentRegisterInput = {
    id: string;
    name: string;
    streaming?: boolean;
};

export type EngineHumanRegisterInput = {
    id?: string;
    name?: string;
    preferences?: Partial<HumanDeliveryPreferences>;
    listener?: HumanParticipantListener;
};

export type EngineRouteOptions = {
    type?: "direct" | "meeting_broadcast";
    targetIds?: readonly string[];
};

export type EngineRouteResult = {
    message: Message;
    report: ChannelDeliveryReport;
};

export type EngineObserveOptions = {
    recipientId?: string;
    types?: readonly EngineEventType[];
};

/**
 * Entry points for the interpreter layer. Identifier text is parsed here, once;
 * everything behind the facade works on typed ids.
 */
export class Engine {
    readonly config: Config;
    readonly eventBus: EngineEventBus;
    readonly router: Router;
    readonly meetings: Meetings;

    constructor(options: EngineOptions = {}) {
        this.config = options.config ?? configResolve(options.settings);
        this.eventBus = options.eventBus ?? new EngineEventBus();
        this.router = new Router({ eventBus: this.eventBus, config: this.config });
        this.meetings = new Meetings({ router: this.router, eventBus: this.eventBus, config: this.config });
        if (options.human !== false) {
            this.participantHumanRegister(options.human ?? {});
        }
        logger.debug(
            { quorumTimeoutMs: this.config.meetings.quorumTimeoutMs, batchWindowMs: this.config.waits.batchWindowMs },
            "init: Engine ready"
        );
    }

    participantAgentRegister(input: EngineAgentRegisterInput): AgentParticipant {
        const participant = new AgentParticipant({
            id: agentId(input.id),
            name: input.name,
            streaming: input.streaming
        });
        this.router.participantRegister(participant);
        return participant;
    }

    participantHumanRegister(input: EngineHumanRegisterInput = {}): HumanParticipant {
        const participant = new HumanParticipant({
            id: humanRef(input.id),
            name: input.name,
            preferences: input.preferences,
            listener: input.listener
        });
        this.router.participantRegister(participant);
        return participant;
    }

    participantGet(text: string): Participant | null {
        return this.router.participantGet(idParseParticipant(text));
    }

    /**
     * Sends content to an agent, a human or a meeting. Meeting recipients become a broadcast.
     */
    async routeMessage(
        senderText: string,
        recipientText: string,
        content: string,
        options: EngineRouteOptions = {}
    ): Promise<EngineRouteResult> {
        const senderId = idParseParticipant(senderText);
        const recipientId = idParse(recipientText, { bareAs: "agent" });
        const targetIds = options.targetIds?.map((text) => idParseParticipant(text)) ?? null;

        if (recipientId.kind === "meeting") {
            if (options.type === "direct") {
                throw new Error(`Direct message cannot address ${idFormat(recipientId)}`);
            }
            return this.meetings.broadcast(recipientId, senderId, content, { targetIds });
        }
        if (options.type === "meeting_broadcast") {
            throw new Error(`Meeting broadcast cannot address ${idFormat(recipientId)}`);
        }
        return this.router.send({ senderId, recipientId, content });
    }

    /**
     * Resolves with the next batch for the participant. sourceText narrows the batch to one sender
     * or one meeting; null accepts anything.
     */
    async waitForMessages(
        participantText: string,
        sourceText: string | null = null,
        timeoutMs?: number
    ): Promise<Message[]> {
        const participantId = idParseParticipant(participantText);
        const source = sourceText === null ? null : idParse(sourceText, { bareAs: "agent" });
        return this.router.waitForMessages(participantId, source, timeoutMs);
    }

    async createMeeting(
        ownerText: string,
        topic: string,
        requiredTexts: readonly string[],
        optionalTexts: readonly string[] = [],
        sharedState?: Record<string, unknown>
    ): Promise<MeetingSnapshot> {
        return this.meetings.create({
            ownerId: idParseParticipant(ownerText),
            topic,
            requiredIds: requiredTexts.map((text) => idParseParticipant(text)),
            optionalIds: optionalTexts.map((text) => idParseParticipant(text)),
            sharedState
        });
    }

    async waitForQuorum(meetingText: string, timeoutMs?: number): Promise<MeetingSnapshot> {
        return this.meetings.waitForQuorum(idParseMeeting(meetingText), timeoutMs);
    }

    async inviteToMeeting(
        meetingText: string,
        inviterText: string,
        inviteeText: string,
        options: { required?: boolean } = {}
    ): Promise<MeetingInviteResult> {
        return this.meetings.invite(
            idParseMeeting(meetingText),
            idParseParticipant(inviterText),
            idParseParticipant(inviteeText),
            options
        );
    }

    async joinMeeting(meetingText: string, participantText: string): Promise<MeetingJoinResult> {
        return this.meetings.join(idParseMeeting(meetingText), idParseParticipant(participantText));
    }

    async rejectMeeting(
        meetingText: string,
        participantText: string,
        kind: MeetingRejectReason["kind"],
        text: string | null = null
    ): Promise<MeetingRejectResult> {
        return this.meetings.reject(idParseMeeting(meetingText), idParseParticipant(participantText), { kind, text });
    }

    async leaveMeeting(
        meetingText: string,
        participantText: string,
        options: { confirm?: boolean } = {}
    ): Promise<MeetingLeaveResult> {
        return this.meetings.leave(idParseMeeting(meetingText), idParseParticipant(participantText), options);
    }

    async endMeeting(meetingText: string, participantText: string): Promise<MeetingEndResult> {
        return this.meetings.end(idParseMeeting(meetingText), idParseParticipant(participantText));
    }

    async broadcastToMeeting(
        meetingText: string,
        senderText: string,
        content: string,
        targetTexts?: readonly string[]
    ): Promise<EngineRouteResult> {
        return this.meetings.broadcast(idParseMeeting(meetingText), idParseParticipant(senderText), content, {
            targetIds: targetTexts?.map((text) => idParseParticipant(text)) ?? null
        });
    }

    startStream(senderText: string, recipientText: string, targetTexts?: readonly string[]): StreamStartResult {
        return this.router.streamStart({
            senderId: idParseParticipant(senderText),
            recipientId: idParse(recipientText, { bareAs: "agent" }),
            targetIds: targetTexts?.map((text) => idParseParticipant(text)) ?? null
        });
    }

    streamChunk(streamId: string, chunk: string): void {
        this.router.streamChunk(streamId, chunk);
    }

    async completeStream(streamId: string, finalContent?: string): Promise<StreamCompleteResult> {
        return this.router.streamComplete(streamId, finalContent);
    }

    /**
     * Subscribes to engine events. A recipient-scoped observer sees only events addressed to that
     * participant; an unscoped one sees everything.
     */
    observe(listener: EngineEventListener, options: EngineObserveOptions = {}): () => void {
        const filter: EngineEventFilter = { types: options.types };
        if (options.recipientId !== undefined) {
            filter.recipientId = idParseParticipant(options.recipientId);
        }
        return this.eventBus.onEvent(listener, filter);
    }
}
