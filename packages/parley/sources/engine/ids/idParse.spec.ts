import { describe, expect, it } from "vitest";

import { MalformedIdentifierError } from "../errors/malformedIdentifierError.js";
import { idEquals, idFormat, idKey } from "./idFormat.js";
import { idParse, idParseMeeting, idParseParticipant } from "./idParse.js";
import { agentId, humanRef, meetingId } from "./idTypes.js";

describe("idParse", () => {
    it("parses prefixed forms", () => {
        expect(idParse("agent 1234")).toEqual({ kind: "agent", id: "1234" });
        expect(idParse("meeting 42")).toEqual({ kind: "meeting", id: "42" });
        expect(idParse("  Agent   77  ")).toEqual({ kind: "agent", id: "77" });
    });

    it("parses human aliases case-insensitively", () => {
        expect(idParse("human")).toEqual({ kind: "human", id: "human" });
        expect(idParse("USER")).toEqual({ kind: "human", id: "human" });
        expect(idParse("agent human")).toEqual({ kind: "human", id: "human" });
        expect(idParse("human alice")).toEqual({ kind: "human", id: "alice" });
    });

    it("resolves bare numeric ids from the caller's context", () => {
        expect(idParse("1234")).toEqual({ kind: "agent", id: "1234" });
        expect(idParse("1234", { bareAs: "meeting" })).toEqual({ kind: "meeting", id: "1234" });
    });

    it("rejects malformed text with the offending input", () => {
        const cases = ["", "   ", "Accountant", "robot 12", "agent 12 extra", "agent a|b"];
        for (const text of cases) {
            let caught: unknown = null;
            try {
                idParse(text);
            } catch (error) {
                caught = error;
            }
            expect(caught).toBeInstanceOf(MalformedIdentifierError);
            if (caught instanceof MalformedIdentifierError) {
                expect(caught.text).toBe(text);
            }
        }
    });

    it("restricts kinds in the narrow parsers", () => {
        expect(idParseParticipant("agent 5")).toEqual(agentId("5"));
        expect(idParseParticipant("user")).toEqual(humanRef());
        expect(idParseMeeting("7")).toEqual(meetingId("7"));
        expect(() => idParseParticipant("meeting 5")).toThrow(MalformedIdentifierError);
        expect(() => idParseMeeting("agent 5")).toThrow(MalformedIdentifierError);
    });
});

describe("idFormat", () => {
    it("round-trips through idParse", () => {
        const ids = [agentId("1000"), meetingId("100"), humanRef(), humanRef("bob"), agentId("planner-2")];
        for (const id of ids) {
            expect(idParse(idFormat(id))).toEqual(id);
        }
        expect(idFormat(humanRef())).toBe("human");
        expect(idFormat(humanRef("bob"))).toBe("human bob");
    });

    it("keeps human aliases out of other ids so they still round-trip", () => {
        expect(() => agentId("user")).toThrow(MalformedIdentifierError);
        expect(() => agentId("Human")).toThrow('"Human" is reserved for the human participant');
        expect(humanRef("user")).toEqual(humanRef());
        expect(humanRef("User")).toEqual(humanRef());
        const ids = [humanRef("user"), humanRef("HUMAN"), meetingId("user"), humanRef("agent")];
        for (const id of ids) {
            expect(idParse(idFormat(id))).toEqual(id);
        }
    });

    it("keeps kinds apart even when the raw values coincide", () => {
        expect(idEquals(agentId("42"), meetingId("42"))).toBe(false);
        expect(idKey(agentId("42"))).not.toBe(idKey(meetingId("42")));
        expect(idEquals(agentId("42"), agentId("42"))).toBe(true);
    });

    it("returns frozen ids", () => {
        expect(Object.isFrozen(agentId("1"))).toBe(true);
    });
});
