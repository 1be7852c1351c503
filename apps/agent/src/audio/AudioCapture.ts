// Audio Capture
// Platform microphone access, modeled as an injectable capability

export interface AudioFrame {
    /** Interleaved float samples in [-1, 1] */
    samples: Float32Array;
    sampleRate: number;
    channels: number;
}

export type AudioFrameHandler = (frame: AudioFrame) => void;

export interface AudioInput {
    /** False when no input route exists (unplugged device, simulator without mic) */
    readonly isInputAvailable: boolean;
    /** Installs the tap; the handler runs on the capture callback and must not block */
    start(onFrame: AudioFrameHandler): Promise<void>;
    /** Removes the tap; safe to call when not started */
    stop(): void;
    /** Human readable input/output route, used in device diagnostics */
    routeSummary(): string;
}

export interface PermissionGate {
    requestMicrophone(): Promise<boolean>;
    requestSpeechRecognition(): Promise<boolean>;
}
