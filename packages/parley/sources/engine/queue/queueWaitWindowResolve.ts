import type { WaitsConfig } from "../../config/configTypes.js";
import { type MessageTargetCandidate, messageIsFromHuman, messageTargetsParticipant } from "../messages/messageTargets.js";
import type { Message } from "../messages/messageTypes.js";

/**
 * Picks how long to keep collecting meeting traffic before handing it to the participant.
 * Human input returns immediately, traffic addressed to the participant waits briefly,
 * anything else waits for the batch window.
 */
export function queueWaitWindowResolve(
    pending: readonly Message[],
    participant: MessageTargetCandidate,
    waits: Pick<WaitsConfig, "fastWindowMs" | "batchWindowMs">
): number {
    if (pending.some((message) => messageIsFromHuman(message))) {
        return 0;
    }
    if (pending.some((message) => messageTargetsParticipant(message, participant))) {
        return waits.fastWindowMs;
    }
    return waits.batchWindowMs;
}
