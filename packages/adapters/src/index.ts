// ─── Logging ──────────────────────────────────────────────────────────────────
export { createLogger, describeError } from './logging/console-logger.js';
export type { Logger, LogContext } from './logging/console-logger.js';

// ─── Registry ─────────────────────────────────────────────────────────────────
export { InMemoryModelRegistry } from './registry/in-memory-model-registry.js';

// ─── Auth ─────────────────────────────────────────────────────────────────────
export { StaticCredentialVerifier, ANONYMOUS } from './auth/static-credential-verifier.js';
export type { TeamKey } from './auth/static-credential-verifier.js';

// ─── OpenAI-compatible Upstreams ──────────────────────────────────────────────
export { OpenAiCompatibleProvider } from './openai/openai-compatible.provider.js';
export type { OpenAiCompatibleProviderOptions } from './openai/openai-compatible.provider.js';
export { decodeSse, DONE_MARKER } from './openai/sse-decoder.js';
export type { SseMessage } from './openai/sse-decoder.js';

// ─── Ollama Upstream ──────────────────────────────────────────────────────────
export { OllamaProvider } from './ollama/ollama.provider.js';
export type { OllamaProviderOptions } from './ollama/ollama.provider.js';

// ─── Gemini Upstream ──────────────────────────────────────────────────────────
export { GeminiProvider } from './gemini/gemini.provider.js';
export type { GeminiProviderOptions } from './gemini/gemini.provider.js';
