export type MeetingsConfig = {
    /** How long a meeting owner waits for every required attendee to join. */
    quorumTimeoutMs: number;
    historyLimit: number;
    idStart: number;
};

export type WaitsConfig = {
    /** Window used when buffered meeting traffic addresses the waiting participant. */
    fastWindowMs: number;
    /** Window used to let unaddressed meeting traffic accumulate. */
    batchWindowMs: number;
    defaultTimeoutMs: number;
};

export type Config = {
    meetings: MeetingsConfig;
    waits: WaitsConfig;
};

export type SettingsConfig = {
    meetings?: Partial<MeetingsConfig>;
    waits?: Partial<WaitsConfig>;
};
