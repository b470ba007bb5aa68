import { describe, expect, it } from "vitest";

import { agentId, humanRef, meetingId } from "../ids/idTypes.js";
import { messageBuild } from "../messages/messageBuild.js";
import type { Message } from "../messages/messageTypes.js";
import { MessageQueue } from "./messageQueue.js";

describe("MessageQueue", () => {
    it("returns buffered messages without waiting", async () => {
        const queue = new MessageQueue("agent:1");
        const first = directBuild("one");
        const second = directBuild("two");
        queue.put(first);
        queue.put(second);

        const batch = await queue.getBatch({ timeoutMs: 0 });

        expect(batch.map((message) => message.content)).toEqual(["one", "two"]);
        expect(queue.size()).toBe(0);
    });

    it("wakes a waiting consumer on put", async () => {
        const queue = new MessageQueue("agent:1");
        const pending = queue.getBatch({ timeoutMs: Number.POSITIVE_INFINITY });
        queue.put(directBuild("late"));

        const batch = await pending;

        expect(batch.map((message) => message.content)).toEqual(["late"]);
    });

    it("returns a partial batch when the timeout elapses", async () => {
        const queue = new MessageQueue("agent:1");
        queue.put(directBuild("only"));

        const partial = await queue.getBatch({ timeoutMs: 20, minItems: 2 });
        const empty = await queue.getBatch({ timeoutMs: 10 });

        expect(partial.map((message) => message.content)).toEqual(["only"]);
        expect(empty).toEqual([]);
    });

    it("puts priority messages first", () => {
        const queue = new MessageQueue("agent:1");
        queue.put(directBuild("normal"));
        queue.put(directBuild("urgent"), { priority: true });

        expect(queue.peek().map((message) => message.content)).toEqual(["urgent", "normal"]);
    });

    it("takes only matching messages up to maxItems", async () => {
        const queue = new MessageQueue("agent:1");
        queue.put(directBuild("a"));
        queue.put(broadcastBuild("b"));
        queue.put(directBuild("c"));
        queue.put(directBuild("d"));

        const batch = await queue.getBatch({
            predicate: (message) => message.type === "direct",
            timeoutMs: 0,
            maxItems: 2
        });

        expect(batch.map((message) => message.content)).toEqual(["a", "c"]);
        expect(queue.peek().map((message) => message.content)).toEqual(["b", "d"]);
    });

    it("releases waiters on close and rejects later puts", async () => {
        const queue = new MessageQueue("agent:1");
        const pending = queue.getBatch({ timeoutMs: Number.POSITIVE_INFINITY });
        queue.close();

        expect(await pending).toEqual([]);
        expect(queue.isClosed()).toBe(true);
        expect(() => queue.put(directBuild("x"))).toThrow("Queue agent:1 is closed");
    });

    it("waits for a matching message without consuming it", async () => {
        const queue = new MessageQueue("agent:1");
        const isBroadcast = (message: Message) => message.type === "meeting_broadcast";

        expect(await queue.waitFor(isBroadcast, 10)).toBe(false);

        const pending = queue.waitFor(isBroadcast, Number.POSITIVE_INFINITY);
        queue.put(directBuild("ignored"));
        queue.put(broadcastBuild("wanted"));

        expect(await pending).toBe(true);
        expect(queue.size()).toBe(2);
    });

    it("supports snapshot, remove and clear", () => {
        const queue = new MessageQueue("agent:1");
        const first = directBuild("a");
        queue.put(first);
        queue.put(directBuild("b"));

        const snapshot = queue.snapshot();
        expect(Object.isFrozen(snapshot)).toBe(true);
        expect(queue.remove(first.id)).toBe(true);
        expect(queue.remove(first.id)).toBe(false);
        expect(snapshot).toHaveLength(2);
        expect(queue.clear()).toBe(1);
        expect(queue.size()).toBe(0);
    });
});

function directBuild(content: string): Message {
    return messageBuild({
        type: "direct",
        senderId: humanRef(),
        senderName: "Human",
        recipientId: agentId("1"),
        content
    });
}

function broadcastBuild(content: string): Message {
    return messageBuild({
        type: "meeting_broadcast",
        senderId: agentId("2"),
        senderName: "Peer",
        meetingId: meetingId("100"),
        content
    });
}
