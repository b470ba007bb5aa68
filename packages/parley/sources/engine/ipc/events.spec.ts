import { describe, expect, it } from "vitest";

import { agentId, humanRef, meetingId } from "../ids/idTypes.js";
import { type EngineEvent, EngineEventBus } from "./events.js";

describe("EngineEventBus", () => {
    it("delivers events to every subscriber in order", () => {
        const eventBus = new EngineEventBus();
        const seen: string[] = [];
        eventBus.onEvent((event) => {
            seen.push(`first:${event.type}`);
        });
        eventBus.onEvent((event) => {
            seen.push(`second:${event.type}`);
        });

        eventBus.emit({ type: "meeting.left", payload: { meetingId: meetingId("100"), participantId: agentId("1") } });

        expect(seen).toEqual(["first:meeting.left", "second:meeting.left"]);
    });

    it("isolates throwing and rejecting listeners", async () => {
        const eventBus = new EngineEventBus();
        const seen: EngineEvent[] = [];
        eventBus.onEvent(() => {
            throw new Error("listener broke");
        });
        eventBus.onEvent(async () => {
            throw new Error("listener rejected");
        });
        eventBus.onEvent((event) => {
            seen.push(event);
        });

        expect(() =>
            eventBus.emit({ type: "meeting.ended", payload: { meetingId: meetingId("100"), endedBy: null } })
        ).not.toThrow();
        await Promise.resolve();

        expect(seen).toHaveLength(1);
        expect(seen[0]?.payload).toEqual({ meetingId: meetingId("100"), endedBy: null });
    });

    it("routes recipient-scoped events only to matching observers", () => {
        const eventBus = new EngineEventBus();
        const forHuman: string[] = [];
        const forAgent: string[] = [];
        const all: string[] = [];
        eventBus.onEvent(
            (event) => {
                forHuman.push(event.type);
            },
            { recipientId: humanRef() }
        );
        eventBus.onEvent(
            (event) => {
                forAgent.push(event.type);
            },
            { recipientId: agentId("7") }
        );
        eventBus.onEvent((event) => {
            all.push(event.type);
        });

        eventBus.emit({ type: "stream.chunk", payload: { streamId: "s1", chunk: "he" } }, [humanRef()]);
        eventBus.emit({ type: "meeting.ended", payload: { meetingId: meetingId("100"), endedBy: null } });

        expect(forHuman).toEqual(["stream.chunk"]);
        expect(forAgent).toEqual([]);
        expect(all).toEqual(["stream.chunk", "meeting.ended"]);
    });

    it("filters by event type and stops after unsubscribe", () => {
        const eventBus = new EngineEventBus();
        const seen: string[] = [];
        const unsubscribe = eventBus.onEvent(
            (event) => {
                seen.push(event.type);
            },
            { types: ["meeting.joined"] }
        );

        eventBus.emit({ type: "meeting.left", payload: { meetingId: meetingId("1"), participantId: agentId("2") } });
        eventBus.emit({ type: "meeting.joined", payload: { meetingId: meetingId("1"), participantId: agentId("2") } });
        unsubscribe();
        eventBus.emit({ type: "meeting.joined", payload: { meetingId: meetingId("1"), participantId: agentId("3") } });

        expect(seen).toEqual(["meeting.joined"]);
        expect(eventBus.listenerCount()).toBe(0);
    });
});
