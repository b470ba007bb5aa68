export * from "./types.js";
export { CONFIG_DEFAULTS, configResolve } from "./config/configResolve.js";
export { configSettingsParse } from "./config/configSettingsParse.js";
export { getLogger, initLogging, resetLogging, resolveLogConfig } from "./log.js";
export { Engine } from "./engine/engine.js";
export type {
    EngineAgentRegisterInput,
    EngineHumanRegisterInput,
    EngineObserveOptions,
    EngineOptions,
    EngineRouteOptions,
    EngineRouteResult
} from "./engine/engine.js";
export { Channel } from "./engine/channels/channel.js";
export { channelIdDirect, channelIdMeeting } from "./engine/channels/channelIdBuild.js";
export { DeliveryFailureError } from "./engine/errors/deliveryFailureError.js";
export { MalformedIdentifierError } from "./engine/errors/malformedIdentifierError.js";
export { MeetingEndedError } from "./engine/errors/meetingEndedError.js";
export { MeetingTimeoutError } from "./engine/errors/meetingTimeoutError.js";
export { StreamProtocolError } from "./engine/errors/streamProtocolError.js";
export { UnknownRecipientError } from "./engine/errors/unknownRecipientError.js";
export { idEquals, idFormat, idKey } from "./engine/ids/idFormat.js";
export { idParse, idParseMeeting, idParseParticipant } from "./engine/ids/idParse.js";
export { agentId, HUMAN_DEFAULT_ID, humanRef, idIsParticipant, meetingId } from "./engine/ids/idTypes.js";
export { EngineEventBus } from "./engine/ipc/events.js";
export { Meeting } from "./engine/meetings/meeting.js";
export { Meetings } from "./engine/meetings/meetings.js";
export { messageBuild } from "./engine/messages/messageBuild.js";
export { messageBatchFormat, messageFormat } from "./engine/messages/messageFormat.js";
export { messageIsFromHuman, messageTargetsParticipant } from "./engine/messages/messageTargets.js";
export { AgentParticipant } from "./engine/participants/agentParticipant.js";
export { HUMAN_DELIVERY_DEFAULTS, HumanParticipant } from "./engine/participants/humanParticipant.js";
export { MessageQueue } from "./engine/queue/messageQueue.js";
export { queueWaitWindowResolve } from "./engine/queue/queueWaitWindowResolve.js";
export { Router } from "./engine/router/router.js";
export { TranscriptRecorder } from "./engine/transcripts/transcriptRecorder.js";
