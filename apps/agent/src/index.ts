// Local Agent Entry Point
// Live transcription providers, question engine and the session that hosts them

export { loadAgentConfig, requireBackendCredentials, transcriptionFunctionName } from './config.js';
export type { AgentConfig, BackendCredentials, TranscriptionBackend, TranscriptionSettings, TranscriptionStrategy } from './config.js';

// Audio
export type { AudioFrame, AudioFrameHandler, AudioInput, PermissionGate } from './audio/AudioCapture.js';
export { AudioFrameConverter, floatToInt16, int16ToBuffer } from './audio/AudioFrameConverter.js';
export { PcmScratchFile } from './audio/PcmScratchFile.js';
export { WAV_HEADER_BYTES, encodeWav, wavHeader } from './audio/wav.js';
export type { PcmFormat } from './audio/wav.js';

// Transcription
export { createTranscriptionProvider } from './transcription/createTranscriptionProvider.js';
export type { ProviderDependencies } from './transcription/createTranscriptionProvider.js';
export { OnDeviceSegmentedTranscriber } from './transcription/OnDeviceSegmentedTranscriber.js';
export type {
    OnDeviceState,
    RecognitionResult,
    RecognitionTask,
    RecognitionTaskHandlers,
    SpeechRecognizer,
} from './transcription/OnDeviceSegmentedTranscriber.js';
export { PollingTranscriber } from './transcription/PollingTranscriber.js';
export type { PollingTranscriberOptions } from './transcription/PollingTranscriber.js';
export { StreamingTranscriber, buildSessionUpdate } from './transcription/StreamingTranscriber.js';
export type { FallbackReason, StreamingTranscriberOptions } from './transcription/StreamingTranscriber.js';
export { connectRealtimeSocket } from './transcription/realtimeSocket.js';
export type { RealtimeSocket, RealtimeSocketFactory, RealtimeSocketHandlers } from './transcription/realtimeSocket.js';
export { TranscriptSegmentMerger } from './transcription/TranscriptSegmentMerger.js';
export type { SegmentMergerOptions } from './transcription/TranscriptSegmentMerger.js';
export { setTelemetryEnabled, track } from './transcription/telemetry.js';
export * from './transcription/transcriptText.js';
export type * from './transcription/TranscriptionTypes.js';

// Questions
export { QuestionEngine, extractKeywords, minIntervalMs } from './intent/QuestionEngine.js';
export { INITIAL_QUESTION, QUESTION_TEMPLATES, QuestionPool } from './intent/QuestionPool.js';
export type { QuestionTemplate } from './intent/QuestionPool.js';
export type { QuestionEngineAction, RequestNextQuestionAction, ValidateAnswerAction } from './intent/IntentTypes.js';

// Services
export { SupabaseClient } from './services/supabase.js';
export type { FetchLike } from './services/supabase.js';
export { SupabaseJournalRepository } from './services/journalRepository.js';
export type { CompleteSessionInput, JournalRepository } from './services/journalRepository.js';
export { SupabaseQuestionService } from './services/questionService.js';
export type { QuestionService } from './services/questionService.js';
export { SupabaseTranscriptionBackend } from './services/transcriptionBackend.js';
export type { TranscriptionBackendClient } from './services/transcriptionBackend.js';

// Session
export { TranscriptionSession, splitTranscript } from './session/TranscriptionSession.js';
export type { SavedSession, SessionEventListener, TranscriptionSessionOptions } from './session/TranscriptionSession.js';
export { createTranscriptionSession } from './session/createTranscriptionSession.js';
export type { SessionDependencies } from './session/createTranscriptionSession.js';

export * from './utils/errors.js';
