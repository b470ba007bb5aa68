import { describe, expect, it } from "vitest";

import { configResolve } from "../../config/configResolve.js";
import { agentId, humanRef } from "../ids/idTypes.js";
import { EngineEventBus } from "../ipc/events.js";
import { Meetings } from "../meetings/meetings.js";
import { AgentParticipant } from "../participants/agentParticipant.js";
import { HumanParticipant } from "../participants/humanParticipant.js";
import { Router } from "../router/router.js";
import { TranscriptRecorder } from "./transcriptRecorder.js";

describe("TranscriptRecorder", () => {
    it("records deliveries per recipient and meeting broadcasts per meeting", async () => {
        const { eventBus, router, meetings, host, analyst, human } = setupBuild();
        const recorder = new TranscriptRecorder({ eventBus });
        recorder.start();

        await router.send({ senderId: human.id, recipientId: host.id, content: "start planning" });
        const meeting = await meetings.create({ ownerId: host.id, topic: "Planning", requiredIds: [analyst.id] });
        await meetings.join(meeting.id, analyst.id);
        await meetings.broadcast(meeting.id, analyst.id, "ready");
        recorder.stop();
        await router.send({ senderId: human.id, recipientId: host.id, content: "after stop" });

        expect(recorder.entries(host.id).map((entry) => entry.message.content)).toEqual([
            "start planning",
            "Analyst accepted the invitation to meeting 100.",
            "ready"
        ]);
        expect(recorder.meetingTranscript(meeting.id).map((message) => message.content)).toEqual([
            "Analyst joined the meeting.",
            "Meeting started: Planning",
            "ready"
        ]);
        expect(recorder.format(human.id)).toBe("No messages");
    });

    it("keeps streams completed for viewers that watched them", async () => {
        const { eventBus, router, host, analyst, human } = setupBuild();
        const recorder = new TranscriptRecorder({ eventBus });
        recorder.start();

        const watched = router.streamStart({ senderId: host.id, recipientId: human.id });
        router.streamChunk(watched.streamId, "Draft ");
        router.streamChunk(watched.streamId, "ready");
        await router.streamComplete(watched.streamId);
        const degraded = router.streamStart({ senderId: host.id, recipientId: analyst.id });
        await router.streamComplete(degraded.streamId, "Numbers attached");

        expect(
            recorder.streamsCompleted(human.id).map((entry) => ({ streamId: entry.streamId, content: entry.content }))
        ).toEqual([{ streamId: watched.streamId, content: "Draft ready" }]);
        expect(recorder.streamsCompleted(analyst.id)).toEqual([]);
        expect(recorder.entries(analyst.id).map((entry) => entry.message.content)).toEqual(["Numbers attached"]);
    });

    it("limits a scoped recorder to one viewer", async () => {
        const { eventBus, router, host, analyst, human } = setupBuild();
        const recorder = new TranscriptRecorder({ eventBus, recipientId: analyst.id });
        recorder.start();

        await router.send({ senderId: human.id, recipientId: host.id, content: "for host" });
        await router.send({ senderId: host.id, recipientId: analyst.id, content: "for analyst" });

        expect(recorder.entries(host.id)).toEqual([]);
        expect(recorder.format(analyst.id)).toBe("Message from Host(agent 1000) to agent 1001: for analyst");
    });
});

function setupBuild() {
    const eventBus = new EngineEventBus();
    const config = configResolve();
    const router = new Router({ eventBus, config });
    const meetings = new Meetings({ router, eventBus, config });
    const host = new AgentParticipant({ id: agentId("1000"), name: "Host" });
    const analyst = new AgentParticipant({ id: agentId("1001"), name: "Analyst" });
    const human = new HumanParticipant({ id: humanRef() });
    router.participantRegister(host);
    router.participantRegister(analyst);
    router.participantRegister(human);
    return { eventBus, router, meetings, host, analyst, human };
}
