// Transcription Provider Factory
// Picks the transcription strategy from explicit configuration

import type { AudioInput } from '../audio/AudioCapture.js';
import type { AgentConfig } from '../config.js';
import { requireBackendCredentials, transcriptionFunctionName } from '../config.js';
import { SupabaseClient } from '../services/supabase.js';
import type { FetchLike } from '../services/supabase.js';
import { SupabaseTranscriptionBackend } from '../services/transcriptionBackend.js';
import type { TranscriptionBackendClient } from '../services/transcriptionBackend.js';
import { OnDeviceSegmentedTranscriber } from './OnDeviceSegmentedTranscriber.js';
import type { SpeechRecognizer } from './OnDeviceSegmentedTranscriber.js';
import { PollingTranscriber } from './PollingTranscriber.js';
import type { RealtimeSocketFactory } from './realtimeSocket.js';
import { StreamingTranscriber } from './StreamingTranscriber.js';
import type { TranscriptionProvider } from './TranscriptionTypes.js';

export interface ProviderDependencies {
    audioInput: AudioInput;
    /** Required for the on-device strategy; without it the network strategy is used */
    recognizer?: SpeechRecognizer;
    /** Overrides the Supabase-backed transcription client */
    backend?: TranscriptionBackendClient;
    /** Shared client; built from the configured credentials when absent */
    client?: SupabaseClient;
    connect?: RealtimeSocketFactory;
    fetchImpl?: FetchLike;
}

export function createTranscriptionProvider(config: AgentConfig, deps: ProviderDependencies): TranscriptionProvider {
    const settings = config.transcription;

    if (settings.strategy === 'on-device' && deps.recognizer) {
        console.log('[transcription] Using on-device recognition');
        return new OnDeviceSegmentedTranscriber(deps.recognizer, deps.audioInput);
    }

    const functionName = transcriptionFunctionName(settings.backend);
    const backend = deps.backend ?? new SupabaseTranscriptionBackend(
        deps.client ?? new SupabaseClient(requireBackendCredentials(config), deps.fetchImpl),
        functionName
    );

    const createPolling = (initialTranscript: string): PollingTranscriber => new PollingTranscriber({
        backend,
        audioInput: deps.audioInput,
        recordingsDir: config.recordingsDir,
        initialTranscript,
        label: functionName,
    });

    if (settings.backend === 'openai' && settings.streamingEnabled) {
        console.log('[transcription] Using realtime streaming with polling fallback');
        return new StreamingTranscriber({
            backend,
            audioInput: deps.audioInput,
            realtimeUrl: settings.realtimeUrl,
            model: settings.streamModel,
            recordingsDir: config.recordingsDir,
            connect: deps.connect,
            createFallback: createPolling,
        });
    }

    console.log(`[transcription] Using batch polling (${functionName})`);
    return createPolling('');
}
