import { MalformedIdentifierError } from "../errors/malformedIdentifierError.js";

export type AgentId = { readonly kind: "agent"; readonly id: string };
export type MeetingId = { readonly kind: "meeting"; readonly id: string };
export type HumanRef = { readonly kind: "human"; readonly id: string };

export type ParticipantId = AgentId | HumanRef;
export type EntityId = ParticipantId | MeetingId;
export type EntityKind = EntityId["kind"];

export const HUMAN_DEFAULT_ID = "human";

/** Words that always name the default human in text, so no other id may take them. */
export const HUMAN_ALIASES: ReadonlySet<string> = new Set(["human", "user"]);

const ID_VALUE_PATTERN = /^[A-Za-z0-9_.-]+$/;

export function agentId(value: string): AgentId {
    const normalized = idValueNormalize(value);
    if (HUMAN_ALIASES.has(normalized.toLowerCase())) {
        throw new MalformedIdentifierError(value, `"${normalized}" is reserved for the human participant`);
    }
    const id: AgentId = { kind: "agent", id: normalized };
    return Object.freeze(id);
}

export function meetingId(value: string): MeetingId {
    const id: MeetingId = { kind: "meeting", id: idValueNormalize(value) };
    return Object.freeze(id);
}

/**
 * Any alias spelling collapses to the default human id.
 */
export function humanRef(value: string = HUMAN_DEFAULT_ID): HumanRef {
    const normalized = idValueNormalize(value);
    const id: HumanRef = {
        kind: "human",
        id: HUMAN_ALIASES.has(normalized.toLowerCase()) ? HUMAN_DEFAULT_ID : normalized
    };
    return Object.freeze(id);
}

export function idIsParticipant(id: EntityId): id is ParticipantId {
    return id.kind === "agent" || id.kind === "human";
}

export function idValueIsValid(value: string): boolean {
    return ID_VALUE_PATTERN.test(value);
}

function idValueNormalize(value: string): string {
    const normalized = value.trim();
    if (!normalized) {
        throw new MalformedIdentifierError(value, "identifier cannot be empty");
    }
    if (!ID_VALUE_PATTERN.test(normalized)) {
        throw new MalformedIdentifierError(value, "identifier may only contain letters, digits, '.', '_' and '-'");
    }
    return normalized;
}
