import { type EntityId, HUMAN_DEFAULT_ID } from "./idTypes.js";

/**
 * Renders the canonical text form of an identifier; the output parses back to an equal id.
 */
export function idFormat(id: EntityId): string {
    switch (id.kind) {
        case "agent":
            return `agent ${id.id}`;
        case "meeting":
            return `meeting ${id.id}`;
        case "human":
            return id.id === HUMAN_DEFAULT_ID ? HUMAN_DEFAULT_ID : `human ${id.id}`;
    }
}

/**
 * Builds the map key for an identifier. Keys of different kinds never collide.
 */
export function idKey(id: EntityId): string {
    return `${id.kind}:${id.id}`;
}

export function idEquals(left: EntityId, right: EntityId): boolean {
    return left.kind === right.kind && left.id === right.id;
}
