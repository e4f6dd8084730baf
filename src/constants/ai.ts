export const AI_MAX_OUTPUT_TOKENS = 4096;
export const OLLAMA_DEFAULT_BASE_URL = 'http://localhost:11434';
export const OLLAMA_PLACEHOLDER_API_KEY = 'ollama';

export const PROVIDER_ENV_KEYS = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  gemini: 'GEMINI_API_KEY',
} as const;

export const OPENAI_BASE_URL_ENV = 'OPENAI_BASE_URL';
export const ANTHROPIC_BASE_URL_ENV = 'ANTHROPIC_BASE_URL';
export const OLLAMA_BASE_URL_ENV = 'OLLAMA_API_BASE';
