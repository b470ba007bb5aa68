import { idEquals, idKey } from "../ids/idFormat.js";
import type { MeetingId, ParticipantId } from "../ids/idTypes.js";
import type { Message } from "../messages/messageTypes.js";
import type {
    MeetingHistoryEntry,
    MeetingInvitation,
    MeetingSnapshot,
    MeetingStatus
} from "./meetingTypes.js";

export type MeetingOptions = {
    id: MeetingId;
    ownerId: ParticipantId;
    topic: string;
    requiredIds: readonly ParticipantId[];
    optionalIds: readonly ParticipantId[];
    sharedState?: Record<string, unknown>;
    historyLimit: number;
};

/**
 * State of one meeting. Lifecycle only moves forward: forming, active, ended.
 * Mutations wake anyone blocked in waitForChange.
 */
export class Meeting {
    readonly id: MeetingId;
    readonly ownerId: ParticipantId;
    readonly topic: string;
    readonly createdAt: number;
    private statusValue: MeetingStatus = "forming";
    private startedAt: number | null = null;
    private endedAt: number | null = null;
    private readonly requiredIds: ParticipantId[];
    private readonly optionalIds: ParticipantId[];
    private joinedIds: ParticipantId[];
    private peakJoined: number;
    private readonly invitations = new Map<string, MeetingInvitation>();
    private readonly sharedState: Record<string, unknown>;
    private history: MeetingHistoryEntry[] = [];
    private nextSeq = 1;
    private readonly readCursors = new Map<string, number>();
    private readonly historyLimit: number;
    private waiters = new Set<() => void>();

    constructor(options: MeetingOptions) {
        this.id = options.id;
        this.ownerId = options.ownerId;
        this.topic = options.topic;
        this.requiredIds = [...options.requiredIds];
        this.optionalIds = [...options.optionalIds];
        this.sharedState = { ...options.sharedState };
        this.historyLimit = options.historyLimit;
        this.joinedIds = [options.ownerId];
        this.peakJoined = 1;
        this.createdAt = Date.now();
    }

    get status(): MeetingStatus {
        return this.statusValue;
    }

    isEnded(): boolean {
        return this.statusValue === "ended";
    }

    isMember(participantId: ParticipantId): boolean {
        return this.joinedIds.some((id) => idEquals(id, participantId));
    }

    memberIds(): ParticipantId[] {
        return [...this.joinedIds];
    }

    /**
     * True once two or more participants have been joined at the same time.
     */
    wasMultiParty(): boolean {
        return this.peakJoined >= 2;
    }

    attendeeAdd(participantId: ParticipantId, required: boolean): void {
        const list = required ? this.requiredIds : this.optionalIds;
        const other = required ? this.optionalIds : this.requiredIds;
        if (!list.some((id) => idEquals(id, participantId))) {
            list.push(participantId);
        }
        const otherIndex = other.findIndex((id) => idEquals(id, participantId));
        if (otherIndex >= 0) {
            other.splice(otherIndex, 1);
        }
    }

    invitationGet(participantId: ParticipantId): MeetingInvitation | null {
        return this.invitations.get(idKey(participantId)) ?? null;
    }

    invitationSet(invitation: MeetingInvitation): void {
        this.invitations.set(idKey(invitation.inviteeId), invitation);
        this.notify();
    }

    join(participantId: ParticipantId): void {
        if (this.isMember(participantId)) {
            return;
        }
        this.joinedIds.push(participantId);
        this.peakJoined = Math.max(this.peakJoined, this.joinedIds.length);
        this.readCursors.set(idKey(participantId), this.nextSeq - 1);
        this.notify();
    }

    leave(participantId: ParticipantId): boolean {
        const before = this.joinedIds.length;
        this.joinedIds = this.joinedIds.filter((id) => !idEquals(id, participantId));
        const left = this.joinedIds.length !== before;
        if (left) {
            this.notify();
        }
        return left;
    }

    quorumMissing(): ParticipantId[] {
        return this.requiredIds.filter((id) => !this.isMember(id));
    }

    start(): boolean {
        if (this.statusValue !== "forming") {
            return false;
        }
        this.statusValue = "active";
        this.startedAt = Date.now();
        this.notify();
        return true;
    }

    end(): boolean {
        if (this.statusValue === "ended") {
            return false;
        }
        this.statusValue = "ended";
        this.endedAt = Date.now();
        this.notify();
        return true;
    }

    historyAppend(message: Message): MeetingHistoryEntry {
        const entry: MeetingHistoryEntry = { seq: this.nextSeq, message };
        this.nextSeq += 1;
        this.history.push(entry);
        if (this.history.length > this.historyLimit) {
            this.history = this.history.slice(this.history.length - this.historyLimit);
        }
        this.notify();
        return entry;
    }

    historyList(): MeetingHistoryEntry[] {
        return [...this.history];
    }

    /**
     * Messages the participant has not marked read, excluding its own.
     */
    unread(participantId: ParticipantId): Message[] {
        const cursor = this.readCursors.get(idKey(participantId)) ?? 0;
        return this.history
            .filter((entry) => entry.seq > cursor && !idEquals(entry.message.senderId, participantId))
            .map((entry) => entry.message);
    }

    markRead(participantId: ParticipantId): number {
        const seq = this.nextSeq - 1;
        this.readCursors.set(idKey(participantId), seq);
        return seq;
    }

    stateSet(key: string, value: unknown): void {
        this.sharedState[key] = value;
        this.notify();
    }

    stateGet(key: string): unknown {
        return Object.hasOwn(this.sharedState, key) ? this.sharedState[key] : undefined;
    }

    /**
     * Resolves true on the next mutation, false once timeoutMs elapses.
     */
    waitForChange(timeoutMs: number): Promise<boolean> {
        return new Promise<boolean>((resolve) => {
            let timer: ReturnType<typeof setTimeout> | null = null;
            const waiter = () => {
                if (timer) {
                    clearTimeout(timer);
                }
                resolve(true);
            };
            this.waiters.add(waiter);
            if (Number.isFinite(timeoutMs)) {
                timer = setTimeout(
                    () => {
                        this.waiters.delete(waiter);
                        resolve(false);
                    },
                    Math.max(0, timeoutMs)
                );
            }
        });
    }

    snapshot(): MeetingSnapshot {
        return {
            id: this.id,
            ownerId: this.ownerId,
            topic: this.topic,
            status: this.statusValue,
            requiredIds: [...this.requiredIds],
            optionalIds: [...this.optionalIds],
            joinedIds: [...this.joinedIds],
            invitations: Array.from(this.invitations.values(), (invitation) => ({ ...invitation })),
            sharedState: { ...this.sharedState },
            createdAt: this.createdAt,
            startedAt: this.startedAt,
            endedAt: this.endedAt
        };
    }

    private notify(): void {
        const waiters = [...this.waiters];
        this.waiters.clear();
        for (const waiter of waiters) {
            waiter();
        }
    }
}
