export type Clock = () => number;

// Call order is up to the caller: stop() before start() yields a meaningless total.
export class Stopwatch {
    private startedAt = 0;
    private stoppedAt = 0;

    constructor(private readonly clock: Clock = Date.now) {}

    start(): void {
        this.startedAt = this.clock();
    }

    stop(): void {
        this.stoppedAt = this.clock();
    }

    get startTime(): number {
        return this.startedAt;
    }

    get endTime(): number {
        return this.stoppedAt;
    }

    get totalTimeMillis(): number {
        return this.stoppedAt - this.startedAt;
    }

    elapsedSeconds(): number {
        return this.totalTimeMillis / 1000;
    }
}
