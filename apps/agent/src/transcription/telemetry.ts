// Transcription Telemetry
// Structured one-line event logs for transport choice, fallbacks and latency

let enabled = true;

export function setTelemetryEnabled(value: boolean): void {
    enabled = value;
}

export function formatTelemetryLine(name: string, fields: Record<string, string> = {}): string {
    const payload = Object.keys(fields)
        .sort()
        .map(key => `${key}=${fields[key]}`)
        .join(' ');
    return payload ? `event=${name} ${payload}` : `event=${name}`;
}

export function track(name: string, fields: Record<string, string> = {}): void {
    if (!enabled) return;
    console.log(`[telemetry] ${formatTelemetryLine(name, fields)}`);
}

/**
 * Tracks the latency of the first transcript a provider produces, once per start
 */
export class FirstPartialTracker {
    private startedAt: number | null = null;
    private tracked = false;

    constructor(private readonly transport: string) {}

    begin(now: number = Date.now()): void {
        this.startedAt = now;
        this.tracked = false;
    }

    mark(now: number = Date.now()): void {
        if (this.tracked) return;
        this.tracked = true;
        const elapsedMs = Math.max(0, now - (this.startedAt ?? now));
        track('transcription_first_partial_ms', {
            transport: this.transport,
            value: String(Math.round(elapsedMs)),
        });
    }
}
