import { idFormat } from "../ids/idFormat.js";
import type { MeetingId, ParticipantId } from "../ids/idTypes.js";

export class MeetingTimeoutError extends Error {
    readonly meetingId: MeetingId;
    readonly missingIds: readonly ParticipantId[];
    readonly timeoutMs: number;

    constructor(meetingId: MeetingId, missingIds: readonly ParticipantId[], timeoutMs: number) {
        const missing = missingIds.map((id) => idFormat(id)).join(", ");
        super(`${idFormat(meetingId)} did not reach quorum within ${timeoutMs}ms; missing: ${missing}`);
        this.name = "MeetingTimeoutError";
        this.meetingId = meetingId;
        this.missingIds = missingIds;
        this.timeoutMs = timeoutMs;
    }
}
