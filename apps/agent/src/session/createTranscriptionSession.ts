// Session Factory
// Wires config, the chosen provider and the Supabase collaborators into one session

import type { PermissionGate } from '../audio/AudioCapture.js';
import type { AgentConfig } from '../config.js';
import { requireBackendCredentials } from '../config.js';
import { SupabaseJournalRepository } from '../services/journalRepository.js';
import type { JournalRepository } from '../services/journalRepository.js';
import { SupabaseQuestionService } from '../services/questionService.js';
import type { QuestionService } from '../services/questionService.js';
import { SupabaseClient } from '../services/supabase.js';
import { createTranscriptionProvider } from '../transcription/createTranscriptionProvider.js';
import type { ProviderDependencies } from '../transcription/createTranscriptionProvider.js';
import { setTelemetryEnabled } from '../transcription/telemetry.js';
import { TranscriptionSession } from './TranscriptionSession.js';

export interface SessionDependencies extends ProviderDependencies {
    permissions: PermissionGate;
    /** Signed-in user's token for table writes and function calls */
    accessToken?: string | null;
    repository?: JournalRepository;
    questionService?: QuestionService;
}

/**
 * Builds a session from explicit configuration. Without Supabase credentials
 * the session records locally and asks questions from the built-in pool.
 */
export function createTranscriptionSession(config: AgentConfig, deps: SessionDependencies): TranscriptionSession {
    setTelemetryEnabled(config.telemetryEnabled);

    let client = deps.client;
    if (!client && config.supabaseUrl && config.supabaseAnonKey) {
        client = new SupabaseClient(requireBackendCredentials(config), deps.fetchImpl);
    }
    if (client && deps.accessToken !== undefined) {
        client.setAccessToken(deps.accessToken);
    }

    const provider = createTranscriptionProvider(config, { ...deps, client });

    return new TranscriptionSession({
        provider,
        permissions: deps.permissions,
        repository: deps.repository ?? (client ? new SupabaseJournalRepository(client) : undefined),
        questionService: deps.questionService ?? (client ? new SupabaseQuestionService(client) : undefined),
        proactivity: config.proactivity,
    });
}
