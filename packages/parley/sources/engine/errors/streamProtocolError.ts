export type StreamProtocolErrorReason = "unknown_stream" | "stream_completed";

export class StreamProtocolError extends Error {
    readonly streamId: string;
    readonly reason: StreamProtocolErrorReason;

    constructor(streamId: string, reason: StreamProtocolErrorReason) {
        super(
            reason === "stream_completed"
                ? `Stream ${streamId} is already completed`
                : `Stream ${streamId} was never started`
        );
        this.name = "StreamProtocolError";
        this.streamId = streamId;
        this.reason = reason;
    }
}
