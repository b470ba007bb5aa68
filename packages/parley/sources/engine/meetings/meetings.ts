import type { Config } from "../../config/configTypes.js";
import { getLogger } from "../../log.js";
import type { Channel } from "../channels/channel.js";
import type { ChannelDeliveryFailure, ChannelDeliveryReport } from "../channels/channelTypes.js";
import { MeetingEndedError } from "../errors/meetingEndedError.js";
import { MeetingTimeoutError } from "../errors/meetingTimeoutError.js";
import { idEquals, idFormat, idKey } from "../ids/idFormat.js";
import type { MeetingId, ParticipantId } from "../ids/idTypes.js";
import type { EngineEventBus } from "../ipc/events.js";
import { messageBuild } from "../messages/messageBuild.js";
import type { Message } from "../messages/messageTypes.js";
import type { Participant } from "../participants/participantTypes.js";
import type { Router } from "../router/router.js";
import { Meeting } from "./meeting.js";
import type {
    MeetingCreateInput,
    MeetingEndResult,
    MeetingInvitation,
    MeetingInviteResult,
    MeetingJoinResult,
    MeetingLeaveResult,
    MeetingRejectReason,
    MeetingRejectResult,
    MeetingSnapshot
} from "./meetingTypes.js";

const logger = getLogger("engine.meetings");

export type MeetingsOptions = {
    router: Router;
    eventBus: EngineEventBus;
    config: Config;
};

export type MeetingBroadcastOptions = {
    targetIds?: readonly ParticipantId[] | null;
};

export type MeetingBroadcastResult = {
    message: Message;
    report: ChannelDeliveryReport;
};

export type MeetingLeaveOptions = {
    /** Required to let the sole remaining participant of a multi-party meeting end it by leaving. */
    confirm?: boolean;
};

/**
 * Meeting lifecycle on top of channels: invitations over 1:1 channels, quorum gating,
 * group broadcast with history, departures and ending.
 */
export class Meetings {
    private readonly router: Router;
    private readonly eventBus: EngineEventBus;
    private readonly config: Config;

    constructor(options: MeetingsOptions) {
        this.router = options.router;
        this.eventBus = options.eventBus;
        this.config = options.config;
    }

    /**
     * Creates a meeting with the owner joined and invites every attendee.
     * A meeting without required attendees starts immediately.
     * Invitations that could not be delivered show up as "undelivered" in the snapshot.
     */
    async create(input: MeetingCreateInput): Promise<MeetingSnapshot> {
        const topic = input.topic.trim();
        if (!topic) {
            throw new Error("Meeting topic cannot be empty.");
        }
        const owner = this.router.participantRequire(input.ownerId);
        const required = attendeesResolve(input.requiredIds, [owner.id]);
        const optional = attendeesResolve(input.optionalIds ?? [], [owner.id, ...required]);
        const invitees = [...required, ...optional].map((id) => this.router.participantRequire(id));

        const meeting = this.router.meetingRegister(
            (id) =>
                new Meeting({
                    id,
                    ownerId: owner.id,
                    topic,
                    requiredIds: required,
                    optionalIds: optional,
                    sharedState: input.sharedState,
                    historyLimit: this.config.meetings.historyLimit
                })
        );
        this.router.meetingChannelGetOrCreate(meeting.id, [owner]);
        logger.info(
            {
                meetingId: meeting.id.id,
                owner: idFormat(owner.id),
                required: required.length,
                optional: optional.length
            },
            "event: Meeting created"
        );
        this.eventBus.emit({ type: "meeting.created", payload: { meeting: meeting.snapshot() } }, [
            owner.id,
            ...invitees.map((invitee) => invitee.id)
        ]);

        for (const invitee of invitees) {
            const isRequired = required.some((id) => idEquals(id, invitee.id));
            await this.invitationIssue(meeting, owner, invitee, isRequired);
        }
        if (required.length === 0) {
            await this.startIfReady(meeting);
        }
        return meeting.snapshot();
    }

    /**
     * Suspends until every required attendee has joined.
     * Rejections do not end the wait; the timeout names whoever is still missing.
     */
    async waitForQuorum(
        meetingId: MeetingId,
        timeoutMs: number = this.config.meetings.quorumTimeoutMs
    ): Promise<MeetingSnapshot> {
        const meeting = this.router.meetingRequire(meetingId);
        const deadline = Date.now() + Math.max(0, timeoutMs);
        while (true) {
            if (meeting.isEnded()) {
                throw new MeetingEndedError(meeting.id, "wait for quorum");
            }
            const missing = meeting.quorumMissing();
            if (missing.length === 0) {
                return meeting.snapshot();
            }
            const remaining = deadline - Date.now();
            if (remaining <= 0) {
                logger.warn(
                    { meetingId: meeting.id.id, missing: missing.map((id) => idFormat(id)) },
                    "error: Meeting quorum timed out"
                );
                throw new MeetingTimeoutError(meeting.id, missing, timeoutMs);
            }
            await meeting.waitForChange(remaining);
        }
    }

    /**
     * Invites a participant. Re-inviting someone already joined or still pending changes nothing.
     */
    async invite(
        meetingId: MeetingId,
        inviterId: ParticipantId,
        inviteeId: ParticipantId,
        options: { required?: boolean } = {}
    ): Promise<MeetingInviteResult> {
        const meeting = this.meetingLive(meetingId, "invite");
        const inviter = this.memberRequire(meeting, inviterId);
        const invitee = this.router.participantRequire(inviteeId);

        if (meeting.isMember(invitee.id)) {
            return { type: "already_joined" };
        }
        const existing = meeting.invitationGet(invitee.id);
        if (existing && existing.status === "pending") {
            return { type: "already_invited", invitation: { ...existing } };
        }

        const issued = await this.invitationIssue(meeting, inviter, invitee, options.required ?? false);
        const noticeFailed = await this.noticeSend(
            meeting,
            inviter,
            `${inviter.name} invited ${invitee.name} to the meeting.`
        );
        return { type: "invited", invitation: issued.invitation, failed: [...issued.failed, ...noticeFailed] };
    }

    async join(meetingId: MeetingId, participantId: ParticipantId): Promise<MeetingJoinResult> {
        const meeting = this.meetingLive(meetingId, "join");
        const participant = this.router.participantRequire(participantId);
        if (meeting.isMember(participant.id)) {
            return { type: "already_joined" };
        }
        const invitation = this.invitationPending(meeting, participant.id);

        meeting.invitationSet({ ...invitation, status: "joined", respondedAt: Date.now() });
        meeting.join(participant.id);
        this.channelFor(meeting).participantAdd(participant);
        logger.info({ meetingId: meeting.id.id, participant: idFormat(participant.id) }, "event: Meeting joined");

        const failed = await this.responseSend(
            meeting,
            participant,
            `${participant.name} accepted the invitation to ${idFormat(meeting.id)}.`
        );
        failed.push(
            ...(await this.noticeSend(meeting, participant, `${participant.name} joined the meeting.`, [
                meeting.ownerId
            ]))
        );
        this.eventBus.emit(
            { type: "meeting.joined", payload: { meetingId: meeting.id, participantId: participant.id } },
            meeting.memberIds()
        );
        failed.push(...(await this.startIfReady(meeting)));
        return { type: "joined", meeting: meeting.snapshot(), failed };
    }

    async reject(
        meetingId: MeetingId,
        participantId: ParticipantId,
        reason: MeetingRejectReason
    ): Promise<MeetingRejectResult> {
        const meeting = this.meetingLive(meetingId, "reject");
        const participant = this.router.participantRequire(participantId);
        const invitation = this.invitationPending(meeting, participant.id);
        const rejected: MeetingInvitation = { ...invitation, status: "rejected", reason, respondedAt: Date.now() };
        meeting.invitationSet(rejected);
        logger.info(
            { meetingId: meeting.id.id, participant: idFormat(participant.id), reason: reason.kind },
            "event: Meeting invitation rejected"
        );

        const detail = reason.text ? `${reason.kind}: ${reason.text}` : reason.kind;
        const failed = await this.responseSend(
            meeting,
            participant,
            `${participant.name} declined the invitation to ${idFormat(meeting.id)} (${detail}).`
        );
        const notice = `${participant.name} declined the invitation (${detail}).`;
        failed.push(...(await this.noticeSend(meeting, participant, notice, [meeting.ownerId])));
        this.eventBus.emit(
            { type: "meeting.rejected", payload: { meetingId: meeting.id, participantId: participant.id, reason } },
            [meeting.ownerId]
        );
        return { invitation: { ...rejected }, failed };
    }

    async broadcast(
        meetingId: MeetingId,
        senderId: ParticipantId,
        content: string,
        options: MeetingBroadcastOptions = {}
    ): Promise<MeetingBroadcastResult> {
        const meeting = this.meetingLive(meetingId, "broadcast");
        const sender = this.memberRequire(meeting, senderId);
        if (content.trim().length === 0) {
            throw new Error("Message content cannot be empty.");
        }
        const message = messageBuild({
            type: "meeting_broadcast",
            senderId: sender.id,
            senderName: sender.name,
            meetingId: meeting.id,
            targetIds: options.targetIds ?? null,
            content
        });
        meeting.historyAppend(message);
        const report = await this.channelFor(meeting).send(message, sender.id);
        return { message, report };
    }

    /**
     * Removes a participant. The last one left of a meeting that was ever multi-party must confirm,
     * and its confirmed departure ends the meeting.
     */
    async leave(
        meetingId: MeetingId,
        participantId: ParticipantId,
        options: MeetingLeaveOptions = {}
    ): Promise<MeetingLeaveResult> {
        const meeting = this.meetingLive(meetingId, "leave");
        if (!meeting.isMember(participantId)) {
            return { type: "not_member" };
        }
        const participant = this.router.participantRequire(participantId);
        if (meeting.memberIds().length === 1 && meeting.wasMultiParty() && !options.confirm) {
            logger.info(
                { meetingId: meeting.id.id, participant: idFormat(participant.id) },
                "skip: Leave needs confirmation from the last participant"
            );
            this.eventBus.emit(
                {
                    type: "meeting.confirmation_requested",
                    payload: { meetingId: meeting.id, participantId: participant.id }
                },
                [participant.id]
            );
            return { type: "confirmation_required" };
        }

        meeting.leave(participant.id);
        this.channelFor(meeting).participantRemove(participant.id);
        this.eventBus.emit(
            { type: "meeting.left", payload: { meetingId: meeting.id, participantId: participant.id } },
            [participant.id, ...meeting.memberIds()]
        );
        logger.info({ meetingId: meeting.id.id, participant: idFormat(participant.id) }, "event: Meeting left");

        if (meeting.memberIds().length === 0) {
            this.endApply(meeting, participant.id);
            return { type: "left", ended: true, failed: [] };
        }
        const failed = await this.noticeSend(meeting, participant, `${participant.name} left the meeting.`);
        return { type: "left", ended: false, failed };
    }

    async end(meetingId: MeetingId, participantId: ParticipantId): Promise<MeetingEndResult> {
        const meeting = this.meetingLive(meetingId, "end");
        const participant = this.memberRequire(meeting, participantId);
        const notice = this.noticeBuild(meeting, participant, `${participant.name} ended the meeting.`);
        meeting.historyAppend(notice);
        this.endApply(meeting, participant.id);
        const report = await this.channelFor(meeting).send(notice, participant.id);
        return { meeting: meeting.snapshot(), failed: report.failed };
    }

    stateSet(meetingId: MeetingId, participantId: ParticipantId, key: string, value: unknown): void {
        const meeting = this.meetingLive(meetingId, "update state");
        const participant = this.memberRequire(meeting, participantId);
        meeting.stateSet(key, value);
        this.eventBus.emit(
            {
                type: "meeting.state_updated",
                payload: { meetingId: meeting.id, key, value, updatedBy: participant.id }
            },
            meeting.memberIds()
        );
    }

    stateGet(meetingId: MeetingId): Record<string, unknown>;
    stateGet(meetingId: MeetingId, key: string): unknown;
    stateGet(meetingId: MeetingId, key?: string): unknown {
        const meeting = this.router.meetingRequire(meetingId);
        return key === undefined ? meeting.snapshot().sharedState : meeting.stateGet(key);
    }

    unread(meetingId: MeetingId, participantId: ParticipantId): Message[] {
        return this.router.meetingRequire(meetingId).unread(participantId);
    }

    markRead(meetingId: MeetingId, participantId: ParticipantId): number {
        return this.router.meetingRequire(meetingId).markRead(participantId);
    }

    history(meetingId: MeetingId): Message[] {
        return this.router
            .meetingRequire(meetingId)
            .historyList()
            .map((entry) => entry.message);
    }

    /**
     * True while the participant is joined to a meeting that has not ended.
     */
    participantBusy(participantId: ParticipantId): boolean {
        return this.router.meetingsList().some((meeting) => !meeting.isEnded() && meeting.isMember(participantId));
    }

    get(meetingId: MeetingId): MeetingSnapshot {
        return this.router.meetingRequire(meetingId).snapshot();
    }

    list(): MeetingSnapshot[] {
        return this.router.meetingsList().map((meeting) => meeting.snapshot());
    }

    private async invitationIssue(
        meeting: Meeting,
        inviter: Participant,
        invitee: Participant,
        required: boolean
    ): Promise<{ invitation: MeetingInvitation; failed: ChannelDeliveryFailure[] }> {
        meeting.attendeeAdd(invitee.id, required);
        const invitation: MeetingInvitation = {
            inviterId: inviter.id,
            inviteeId: invitee.id,
            required,
            issuedAt: Date.now(),
            status: "pending",
            reason: null,
            respondedAt: null
        };
        meeting.invitationSet(invitation);

        const attendance = required ? "Your attendance is required." : "Your attendance is optional.";
        const message = messageBuild({
            type: "meeting_invitation",
            senderId: inviter.id,
            senderName: inviter.name,
            recipientId: invitee.id,
            meetingId: meeting.id,
            content: `${inviter.name} invites you to ${idFormat(meeting.id)}: ${meeting.topic}. ${attendance}`
        });
        const report = await this.router.channelGetOrCreate([inviter.id, invitee.id]).send(message, inviter.id);
        const issued: MeetingInvitation = report.failed.some((entry) => idEquals(entry.recipientId, invitee.id))
            ? { ...invitation, status: "undelivered" }
            : invitation;
        if (issued.status === "undelivered") {
            meeting.invitationSet(issued);
            logger.warn(
                { meetingId: meeting.id.id, invitee: idFormat(invitee.id), required },
                "error: Meeting invitation was not delivered"
            );
        } else {
            logger.debug(
                { meetingId: meeting.id.id, invitee: idFormat(invitee.id), required },
                "event: Meeting invitation sent"
            );
        }
        this.eventBus.emit(
            { type: "meeting.invited", payload: { meetingId: meeting.id, invitation: { ...issued } } },
            [invitee.id, ...meeting.memberIds()]
        );
        return { invitation: { ...issued }, failed: report.failed };
    }

    private invitationPending(meeting: Meeting, participantId: ParticipantId): MeetingInvitation {
        const invitation = meeting.invitationGet(participantId);
        if (!invitation || invitation.status !== "pending") {
            throw new Error(`${idFormat(participantId)} has no pending invitation to ${idFormat(meeting.id)}`);
        }
        return invitation;
    }

    private async responseSend(
        meeting: Meeting,
        participant: Participant,
        content: string
    ): Promise<ChannelDeliveryFailure[]> {
        const owner = this.router.participantGet(meeting.ownerId);
        if (!owner || idEquals(owner.id, participant.id)) {
            return [];
        }
        const message = messageBuild({
            type: "meeting_invitation_response",
            senderId: participant.id,
            senderName: participant.name,
            recipientId: owner.id,
            meetingId: meeting.id,
            content
        });
        const report = await this.router.channelGetOrCreate([participant.id, owner.id]).send(message, participant.id);
        return report.failed;
    }

    private noticeBuild(meeting: Meeting, sender: Participant, content: string): Message {
        return messageBuild({
            type: "meeting_broadcast",
            senderId: sender.id,
            senderName: sender.name,
            meetingId: meeting.id,
            content
        });
    }

    private async noticeSend(
        meeting: Meeting,
        sender: Participant,
        content: string,
        exclude: readonly ParticipantId[] = []
    ): Promise<ChannelDeliveryFailure[]> {
        const notice = this.noticeBuild(meeting, sender, content);
        meeting.historyAppend(notice);
        const report = await this.channelFor(meeting).send(notice, sender.id, { exclude });
        return report.failed;
    }

    private async startIfReady(meeting: Meeting): Promise<ChannelDeliveryFailure[]> {
        if (meeting.status !== "forming" || meeting.quorumMissing().length > 0) {
            return [];
        }
        meeting.start();
        logger.info({ meetingId: meeting.id.id, joined: meeting.memberIds().length }, "event: Meeting started");
        const owner = this.router.participantRequire(meeting.ownerId);
        const failed = await this.noticeSend(meeting, owner, `Meeting started: ${meeting.topic}`);
        this.eventBus.emit({ type: "meeting.started", payload: { meeting: meeting.snapshot() } }, meeting.memberIds());
        return failed;
    }

    private endApply(meeting: Meeting, endedBy: ParticipantId | null): void {
        if (!meeting.end()) {
            return;
        }
        logger.info({ meetingId: meeting.id.id, endedBy: endedBy ? idFormat(endedBy) : null }, "event: Meeting ended");
        this.eventBus.emit({ type: "meeting.ended", payload: { meetingId: meeting.id, endedBy } }, [
            ...meeting.memberIds(),
            ...(endedBy && !meeting.isMember(endedBy) ? [endedBy] : [])
        ]);
    }

    private meetingLive(meetingId: MeetingId, operation: string): Meeting {
        const meeting = this.router.meetingRequire(meetingId);
        if (meeting.isEnded()) {
            throw new MeetingEndedError(meeting.id, operation);
        }
        return meeting;
    }

    private memberRequire(meeting: Meeting, participantId: ParticipantId): Participant {
        if (!meeting.isMember(participantId)) {
            throw new Error(`${idFormat(participantId)} is not a member of ${idFormat(meeting.id)}`);
        }
        return this.router.participantRequire(participantId);
    }

    private channelFor(meeting: Meeting): Channel {
        return this.router.meetingChannelGetOrCreate(meeting.id);
    }
}

function attendeesResolve(ids: readonly ParticipantId[], excluded: readonly ParticipantId[]): ParticipantId[] {
    const seen = new Set(excluded.map((id) => idKey(id)));
    const result: ParticipantId[] = [];
    for (const id of ids) {
        const key = idKey(id);
        if (seen.has(key)) {
            continue;
        }
        seen.add(key);
        result.push(id);
    }
    return result;
}
