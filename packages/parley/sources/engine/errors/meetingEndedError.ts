import { idFormat } from "../ids/idFormat.js";
import type { MeetingId } from "../ids/idTypes.js";

export class MeetingEndedError extends Error {
    readonly meetingId: MeetingId;
    readonly operation: string;

    constructor(meetingId: MeetingId, operation: string) {
        super(`Cannot ${operation}: ${idFormat(meetingId)} has ended`);
        this.name = "MeetingEndedError";
        this.meetingId = meetingId;
        this.operation = operation;
    }
}
