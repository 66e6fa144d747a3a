import type { Dialect } from '@ai-relay/domain';
import { chatCompletionsDialect } from './chat-completions.dialect.js';
import { embeddingsDialect } from './embeddings.dialect.js';
import { imagesDialect } from './images.dialect.js';
import { responsesDialect } from './responses.dialect.js';
import type { DialectAdapter } from './dialect.js';

export const DIALECT_ADAPTERS: Readonly<Record<Dialect, DialectAdapter>> = {
  chat_completions: chatCompletionsDialect,
  responses: responsesDialect,
  embeddings: embeddingsDialect,
  images: imagesDialect,
};

export { chatCompletionsDialect, responsesDialect, embeddingsDialect, imagesDialect };
export { DONE_FRAME, renderFrame } from './dialect.js';
export type { DialectAdapter, SseFrame, StreamEncoder } from './dialect.js';
