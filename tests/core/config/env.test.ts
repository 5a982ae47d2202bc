import { describe, it, expect } from 'vitest';
import { configFromEnv } from '../../../src/core/config/env.js';

describe('configFromEnv', () => {
    it('returns an empty overlay for an empty environment', () => {
        expect(configFromEnv({})).toEqual({});
    });

    it('maps OpenAI credentials and endpoint', () => {
        expect(configFromEnv({ OPENAI_API_KEY: 'test-secret', OPENAI_BASE_URL: 'http://localhost:8080' })).toEqual({
            providers: { openai: { apiKey: 'test-secret', baseUrl: 'http://localhost:8080' } },
        });
    });

    it('applies OPENAI_MODEL to every agent role', () => {
        const overlay = configFromEnv({ OPENAI_MODEL: 'gpt-4o-mini' });
        expect(overlay).toEqual({
            agents: {
                orchestrator: { model: 'gpt-4o-mini' },
                generator: { model: 'gpt-4o-mini' },
                reviewer: { model: 'gpt-4o-mini' },
                documenter: { model: 'gpt-4o-mini' },
                fallback: { model: 'gpt-4o-mini' },
            },
        });
    });

    it('enables interactive approval only for ALLOW_HUMAN_INPUT=1', () => {
        expect(configFromEnv({ ALLOW_HUMAN_INPUT: '1' })).toEqual({ workflow: { interactive: true } });
        expect(configFromEnv({ ALLOW_HUMAN_INPUT: 'yes' })).toEqual({});
    });

    it('passes retry and Ollama settings through for validation', () => {
        expect(configFromEnv({ CODELOOM_MAX_RETRIES: '5', OLLAMA_BASE_URL: 'http://gpu-box:11434' })).toEqual({
            providers: { ollama: { baseUrl: 'http://gpu-box:11434' } },
            workflow: { maxRetries: 5 },
        });
        expect(configFromEnv({ CODELOOM_MAX_RETRIES: '  ' })).toEqual({});
    });
});
