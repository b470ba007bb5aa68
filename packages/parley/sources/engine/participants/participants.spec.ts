import { describe, expect, it } from "vitest";

import { agentId, humanRef, meetingId } from "../ids/idTypes.js";
import { messageBuild } from "../messages/messageBuild.js";
import type { Message } from "../messages/messageTypes.js";
import { AgentParticipant } from "./agentParticipant.js";
import { HumanParticipant } from "./humanParticipant.js";

describe("AgentParticipant", () => {
    it("buffers every delivery in its inbox", async () => {
        const agent = new AgentParticipant({ id: agentId("1001"), name: "Scorer" });
        const message = broadcastBuild("anything", null);

        expect(await agent.deliver(message)).toBe("delivered");
        expect(agent.inbox.peek()).toEqual([message]);
        expect(agent.capabilities.streaming).toBe(false);
        expect(agent.inbox.ownerKey).toBe("agent:1001");
    });
});

describe("HumanParticipant", () => {
    it("defaults to streaming and all notifications", () => {
        const human = new HumanParticipant({ id: humanRef() });

        expect(human.name).toBe("Human");
        expect(human.capabilities.streaming).toBe(true);
        expect(human.preferencesGet()).toEqual({ streamingEnabled: true, meetingNotifications: "all" });
    });

    it("filters meeting chatter by preference", async () => {
        const human = new HumanParticipant({
            id: humanRef(),
            name: "Alice",
            preferences: { meetingNotifications: "targeted" }
        });

        expect(await human.deliver(broadcastBuild("general update", null))).toBe("skipped");
        expect(await human.deliver(broadcastBuild("Alice, please confirm", null))).toBe("delivered");
        expect(await human.deliver(broadcastBuild("for you", [humanRef()]))).toBe("delivered");

        human.preferencesUpdate({ meetingNotifications: "none" });
        expect(await human.deliver(broadcastBuild("Alice, again", null))).toBe("skipped");
        expect(human.inbox.size()).toBe(2);
    });

    it("always accepts invitations and direct messages", async () => {
        const human = new HumanParticipant({ id: humanRef(), preferences: { meetingNotifications: "none" } });
        const invitation = messageBuild({
            type: "meeting_invitation",
            senderId: agentId("1000"),
            senderName: "Host",
            recipientId: humanRef(),
            meetingId: meetingId("100"),
            content: "Join Planning"
        });
        const direct = messageBuild({
            type: "direct",
            senderId: agentId("1000"),
            senderName: "Host",
            recipientId: humanRef(),
            content: "hi"
        });

        expect(await human.deliver(invitation)).toBe("delivered");
        expect(await human.deliver(direct)).toBe("delivered");
    });

    it("hands accepted messages to the listener", async () => {
        const seen: string[] = [];
        const human = new HumanParticipant({
            id: humanRef(),
            listener: (message) => {
                seen.push(message.content);
            }
        });

        await human.deliver(broadcastBuild("hello", null));
        human.preferencesUpdate({ streamingEnabled: false });

        expect(seen).toEqual(["hello"]);
        expect(human.capabilities.streaming).toBe(false);
    });
});

function broadcastBuild(content: string, targetIds: Message["targetIds"]): Message {
    return messageBuild({
        type: "meeting_broadcast",
        senderId: agentId("1000"),
        senderName: "Host",
        meetingId: meetingId("100"),
        targetIds,
        content
    });
}
