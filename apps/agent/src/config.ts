// Agent Configuration
// Explicit settings handed to the session and providers; nothing reads env after load

import { tmpdir } from 'node:os';
import type { Proactivity } from '@reverie/contracts';
import { ConfigurationError } from './utils/errors.js';

export type TranscriptionBackend = 'openai' | 'mistral';

export type TranscriptionStrategy = 'network' | 'on-device';

export interface TranscriptionSettings {
    backend: TranscriptionBackend;
    streamingEnabled: boolean;
    strategy: TranscriptionStrategy;
    realtimeUrl: string;
    streamModel: string;
}

export interface AgentConfig {
    supabaseUrl?: string;
    supabaseAnonKey?: string;
    transcription: TranscriptionSettings;
    recordingsDir: string;
    proactivity: Proactivity;
    telemetryEnabled: boolean;
}

export interface BackendCredentials {
    url: string;
    anonKey: string;
}

const DEFAULT_REALTIME_URL = 'wss://api.openai.com/v1/realtime';
const DEFAULT_STREAM_MODEL = 'gpt-4o-transcribe';

/**
 * Edge function that performs batch transcription for each backend
 */
export function transcriptionFunctionName(backend: TranscriptionBackend): string {
    return backend === 'mistral' ? 'transcribe-mistral' : 'transcribe';
}

export function loadAgentConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
    return {
        supabaseUrl: readValue(env.SUPABASE_URL),
        supabaseAnonKey: readValue(env.SUPABASE_ANON_KEY),
        transcription: {
            backend: env.REVERIE_TRANSCRIPTION_BACKEND === 'mistral' ? 'mistral' : 'openai',
            streamingEnabled: readFlag(env.REVERIE_STREAMING_ENABLED, false),
            strategy: env.REVERIE_TRANSCRIPTION_STRATEGY === 'on-device' ? 'on-device' : 'network',
            realtimeUrl: readValue(env.REVERIE_REALTIME_URL) ?? DEFAULT_REALTIME_URL,
            streamModel: readValue(env.REVERIE_STREAM_MODEL) ?? DEFAULT_STREAM_MODEL,
        },
        recordingsDir: readValue(env.REVERIE_RECORDINGS_DIR) ?? tmpdir(),
        proactivity: readProactivity(env.REVERIE_PROACTIVITY),
        telemetryEnabled: readFlag(env.REVERIE_TELEMETRY, true),
    };
}

/**
 * Backend URL and key, or a fatal configuration error when either is missing
 */
export function requireBackendCredentials(config: AgentConfig): BackendCredentials {
    if (!config.supabaseUrl) {
        throw new ConfigurationError('Supabase configuration is missing. Check SUPABASE_URL.');
    }
    if (!config.supabaseAnonKey) {
        throw new ConfigurationError('Supabase configuration is missing. Check SUPABASE_ANON_KEY.');
    }
    return { url: config.supabaseUrl.replace(/\/+$/, ''), anonKey: config.supabaseAnonKey };
}

function readValue(raw: string | undefined): string | undefined {
    const value = raw?.trim();
    if (!value || value.toUpperCase().includes('YOUR_')) {
        return undefined;
    }
    return value;
}

function readFlag(raw: string | undefined, fallback: boolean): boolean {
    const value = raw?.trim().toLowerCase();
    if (!value) return fallback;
    return value === '1' || value === 'true' || value === 'yes';
}

function readProactivity(raw: string | undefined): Proactivity {
    if (raw === 'low' || raw === 'high') return raw;
    return 'medium';
}
