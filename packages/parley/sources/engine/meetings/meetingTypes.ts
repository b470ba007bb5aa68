import type { ChannelDeliveryFailure } from "../channels/channelTypes.js";
import type { MeetingId, ParticipantId } from "../ids/idTypes.js";
import type { Message } from "../messages/messageTypes.js";

export type MeetingStatus = "forming" | "active" | "ended";

/** "undelivered" marks an invitation that never reached the invitee; it can be issued again. */
export type MeetingInvitationStatus = "pending" | "joined" | "rejected" | "undelivered";

export type MeetingRejectReason = {
    kind: "busy" | "capability_mismatch" | "declined";
    text: string | null;
};

export type MeetingInvitation = {
    inviterId: ParticipantId;
    inviteeId: ParticipantId;
    required: boolean;
    issuedAt: number;
    status: MeetingInvitationStatus;
    reason: MeetingRejectReason | null;
    respondedAt: number | null;
};

export type MeetingHistoryEntry = {
    seq: number;
    message: Message;
};

export type MeetingSnapshot = {
    id: MeetingId;
    ownerId: ParticipantId;
    topic: string;
    status: MeetingStatus;
    requiredIds: ParticipantId[];
    optionalIds: ParticipantId[];
    joinedIds: ParticipantId[];
    invitations: MeetingInvitation[];
    sharedState: Record<string, unknown>;
    createdAt: number;
    startedAt: number | null;
    endedAt: number | null;
};

export type MeetingCreateInput = {
    ownerId: ParticipantId;
    topic: string;
    requiredIds: readonly ParticipantId[];
    optionalIds?: readonly ParticipantId[];
    sharedState?: Record<string, unknown>;
};

export type MeetingInviteResult =
    | { type: "invited"; invitation: MeetingInvitation; failed: ChannelDeliveryFailure[] }
    | { type: "already_joined" }
    | { type: "already_invited"; invitation: MeetingInvitation };

export type MeetingJoinResult =
    | { type: "joined"; meeting: MeetingSnapshot; failed: ChannelDeliveryFailure[] }
    | { type: "already_joined" };

export type MeetingRejectResult = {
    invitation: MeetingInvitation;
    failed: ChannelDeliveryFailure[];
};

export type MeetingLeaveResult =
    | { type: "left"; ended: boolean; failed: ChannelDeliveryFailure[] }
    | { type: "not_member" }
    | { type: "confirmation_required" };

export type MeetingEndResult = {
    meeting: MeetingSnapshot;
    failed: ChannelDeliveryFailure[];
};
