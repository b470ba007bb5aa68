import { idKey } from "../ids/idFormat.js";
import type { MeetingId, ParticipantId } from "../ids/idTypes.js";

/**
 * Builds the id of the 1:1 channel between participants. Order of the input does not matter.
 */
export function channelIdDirect(participantIds: readonly ParticipantId[]): string {
    const keys = [...new Set(participantIds.map((id) => idKey(id)))].sort();
    if (keys.length < 2) {
        throw new Error("Direct channel requires two distinct participants.");
    }
    return `direct:${keys.join("|")}`;
}

export function channelIdMeeting(meetingId: MeetingId): string {
    return `meeting:${meetingId.id}`;
}
