import { MalformedIdentifierError } from "../errors/malformedIdentifierError.js";
import {
    agentId,
    type EntityId,
    HUMAN_ALIASES,
    HUMAN_DEFAULT_ID,
    humanRef,
    idIsParticipant,
    idValueIsValid,
    type MeetingId,
    meetingId,
    type ParticipantId
} from "./idTypes.js";

const NUMERIC_PATTERN = /^\d+$/;

export type IdParseOptions = {
    /** Kind assigned to a bare numeric id; the parser itself has no way to tell. */
    bareAs?: "agent" | "meeting";
};

/**
 * Parses interpreter text into a typed identifier.
 * Accepts "agent 1234", "meeting 42", "human", "user", "human alice" and bare numeric ids.
 * Expects: called once where text enters the core; downstream code compares typed ids only.
 */
export function idParse(text: string, options: IdParseOptions = {}): EntityId {
    const normalized = text.trim();
    if (!normalized) {
        throw new MalformedIdentifierError(text, "identifier cannot be empty");
    }

    const parts = normalized.split(/\s+/);
    const first = parts[0] ?? "";
    if (parts.length === 1) {
        if (HUMAN_ALIASES.has(first.toLowerCase())) {
            return humanRef(HUMAN_DEFAULT_ID);
        }
        if (NUMERIC_PATTERN.test(first)) {
            return options.bareAs === "meeting" ? meetingId(first) : agentId(first);
        }
        throw new MalformedIdentifierError(text, "expected 'agent <id>', 'meeting <id>', a human alias or a numeric id");
    }
    if (parts.length > 2) {
        throw new MalformedIdentifierError(text, "unexpected trailing text");
    }

    const value = parts[1] ?? "";
    if (!idValueIsValid(value)) {
        throw new MalformedIdentifierError(text, "identifier may only contain letters, digits, '.', '_' and '-'");
    }
    switch (first.toLowerCase()) {
        case "agent":
            return HUMAN_ALIASES.has(value.toLowerCase()) ? humanRef(HUMAN_DEFAULT_ID) : agentId(value);
        case "meeting":
            return meetingId(value);
        case "human":
            return humanRef(value);
        default:
            throw new MalformedIdentifierError(text, `unknown identifier prefix "${first}"`);
    }
}

/**
 * Parses text that must name an agent or a human.
 */
export function idParseParticipant(text: string): ParticipantId {
    const parsed = idParse(text, { bareAs: "agent" });
    if (!idIsParticipant(parsed)) {
        throw new MalformedIdentifierError(text, "expected an agent or human identifier");
    }
    return parsed;
}

/**
 * Parses text that must name a meeting; bare numeric ids are meeting ids here.
 */
export function idParseMeeting(text: string): MeetingId {
    const parsed = idParse(text, { bareAs: "meeting" });
    if (parsed.kind !== "meeting") {
        throw new MalformedIdentifierError(text, "expected a meeting identifier");
    }
    return parsed;
}
