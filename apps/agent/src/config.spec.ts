import { describe, it, expect } from 'vitest';
import { loadAgentConfig, requireBackendCredentials, transcriptionFunctionName } from './config.js';
import { ConfigurationError } from './utils/errors.js';

describe('loadAgentConfig', () => {
    it('should fall back to defaults on an empty environment', () => {
        const config = loadAgentConfig({});

        expect(config.supabaseUrl).toBeUndefined();
        expect(config.supabaseAnonKey).toBeUndefined();
        expect(config.transcription).toEqual({
            backend: 'openai',
            streamingEnabled: false,
            strategy: 'network',
            realtimeUrl: 'wss://api.openai.com/v1/realtime',
            streamModel: 'gpt-4o-transcribe',
        });
        expect(config.proactivity).toBe('medium');
        expect(config.telemetryEnabled).toBe(true);
    });

    it('should read explicit settings', () => {
        const config = loadAgentConfig({
            SUPABASE_URL: 'https://example.supabase.co',
            SUPABASE_ANON_KEY: 'test-anon-key',
            REVERIE_TRANSCRIPTION_BACKEND: 'mistral',
            REVERIE_STREAMING_ENABLED: 'yes',
            REVERIE_TRANSCRIPTION_STRATEGY: 'on-device',
            REVERIE_RECORDINGS_DIR: '/tmp/recordings',
            REVERIE_PROACTIVITY: 'high',
            REVERIE_TELEMETRY: '0',
        });

        expect(config.supabaseUrl).toBe('https://example.supabase.co');
        expect(config.transcription.backend).toBe('mistral');
        expect(config.transcription.streamingEnabled).toBe(true);
        expect(config.transcription.strategy).toBe('on-device');
        expect(config.recordingsDir).toBe('/tmp/recordings');
        expect(config.proactivity).toBe('high');
        expect(config.telemetryEnabled).toBe(false);
    });

    it('should treat placeholder values as missing', () => {
        const config = loadAgentConfig({
            SUPABASE_URL: 'https://YOUR_PROJECT.supabase.co',
            SUPABASE_ANON_KEY: '   ',
        });

        expect(config.supabaseUrl).toBeUndefined();
        expect(config.supabaseAnonKey).toBeUndefined();
    });
});

describe('requireBackendCredentials', () => {
    it('should strip trailing slashes from the URL', () => {
        const config = loadAgentConfig({
            SUPABASE_URL: 'https://example.supabase.co//',
            SUPABASE_ANON_KEY: 'test-anon-key',
        });

        expect(requireBackendCredentials(config)).toEqual({
            url: 'https://example.supabase.co',
            anonKey: 'test-anon-key',
        });
    });

    it('should raise a fatal configuration error when a value is missing', () => {
        const config = loadAgentConfig({ SUPABASE_URL: 'https://example.supabase.co' });

        expect(() => requireBackendCredentials(config)).toThrow(ConfigurationError);
        expect(() => requireBackendCredentials(config)).toThrow(
            'Supabase configuration is missing. Check SUPABASE_ANON_KEY.'
        );
    });
});

describe('transcriptionFunctionName', () => {
    it('should map each backend to its function', () => {
        expect(transcriptionFunctionName('openai')).toBe('transcribe');
        expect(transcriptionFunctionName('mistral')).toBe('transcribe-mistral');
    });
});
