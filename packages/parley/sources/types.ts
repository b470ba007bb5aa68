export type { Config, MeetingsConfig, SettingsConfig, WaitsConfig } from "./config/configTypes.js";
export type {
    ChannelDeliveryFailure,
    ChannelDeliveryReport,
    ChannelKind,
    ChannelSendOptions
} from "./engine/channels/channelTypes.js";
export type { AgentId, EntityId, EntityKind, HumanRef, MeetingId, ParticipantId } from "./engine/ids/idTypes.js";
export type {
    EngineEvent,
    EngineEventBody,
    EngineEventFilter,
    EngineEventListener,
    EngineEventMap,
    EngineEventType
} from "./engine/ipc/events.js";
export type {
    MeetingCreateInput,
    MeetingEndResult,
    MeetingHistoryEntry,
    MeetingInvitation,
    MeetingInvitationStatus,
    MeetingInviteResult,
    MeetingJoinResult,
    MeetingLeaveResult,
    MeetingRejectReason,
    MeetingRejectResult,
    MeetingSnapshot,
    MeetingStatus
} from "./engine/meetings/meetingTypes.js";
export type { Message, MessageBuildInput, MessagePredicate, MessageType } from "./engine/messages/messageTypes.js";
export type {
    HumanDeliveryPreferences,
    HumanMeetingNotifications,
    Participant,
    ParticipantCapabilities,
    ParticipantDeliveryResult
} from "./engine/participants/participantTypes.js";
export type {
    StreamChunkEvent,
    StreamCompleteEvent,
    StreamCompleteResult,
    StreamStartEvent,
    StreamStartInput,
    StreamStartResult
} from "./engine/streams/streamTypes.js";
