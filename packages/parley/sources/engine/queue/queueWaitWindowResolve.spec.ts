import { describe, expect, it } from "vitest";

import { agentId, humanRef, meetingId, type ParticipantId } from "../ids/idTypes.js";
import { messageBuild } from "../messages/messageBuild.js";
import { queueWaitWindowResolve } from "./queueWaitWindowResolve.js";

const waits = { fastWindowMs: 500, batchWindowMs: 5_000 };
const participant = { id: agentId("1001"), name: "Scorer" };

describe("queueWaitWindowResolve", () => {
    it("returns zero when a human spoke", () => {
        const pending = [broadcastBuild(agentId("1002"), "noise"), broadcastBuild(humanRef(), "hello all")];

        expect(queueWaitWindowResolve(pending, participant, waits)).toBe(0);
    });

    it("uses the fast window for traffic addressed to the participant", () => {
        const pending = [broadcastBuild(agentId("1002"), "Scorer, tally it up")];

        expect(queueWaitWindowResolve(pending, participant, waits)).toBe(500);
    });

    it("uses the batch window for unaddressed traffic", () => {
        const pending = [broadcastBuild(agentId("1002"), "thinking out loud")];

        expect(queueWaitWindowResolve(pending, participant, waits)).toBe(5_000);
        expect(queueWaitWindowResolve([], participant, waits)).toBe(5_000);
    });
});

function broadcastBuild(senderId: ParticipantId, content: string) {
    return messageBuild({
        type: "meeting_broadcast",
        senderId,
        senderName: senderId.kind === "human" ? "Human" : "Peer",
        meetingId: meetingId("100"),
        content
    });
}
