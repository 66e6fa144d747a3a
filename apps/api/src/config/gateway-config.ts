/**
 * Gateway file configuration: upstream providers and the model routes that
 * point at them. Loaded at startup and again on SIGHUP.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Dispatcher } from 'undici';
import type { Dialect, ModelRoute, UpstreamProviderPort } from '@ai-relay/domain';
import { GeminiProvider, InMemoryModelRegistry, OllamaProvider, OpenAiCompatibleProvider } from '@ai-relay/adapters';

const providerSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(['openai', 'ollama', 'gemini']),
  baseUrl: z.string().url(),
  /** Name of the environment variable holding the upstream API key. */
  apiKeyEnv: z.string().min(1).optional(),
  headers: z.record(z.string()).optional(),
});

type ProviderKind = z.infer<typeof providerSchema>['kind'];

const routeSchema = z.object({
  model: z.string().min(1),
  provider: z.string().min(1),
  dialect: z.enum(['chat_completions', 'responses', 'embeddings', 'images']),
  path: z.string().optional(),
  upstreamModel: z.string().min(1).optional(),
  maxBatchSize: z.number().int().positive().optional(),
});

const gatewayFileSchema = z
  .object({
    providers: z.array(providerSchema).min(1),
    routes: z.array(routeSchema),
  })
  .superRefine((config, ctx) => {
    const providerKinds = new Map<string, ProviderKind>();
    config.providers.forEach((provider, i) => {
      if (providerKinds.has(provider.id)) {
        ctx.addIssue({ code: 'custom', path: ['providers', i, 'id'], message: `duplicate provider '${provider.id}'` });
      }
      providerKinds.set(provider.id, provider.kind);
    });

    const models = new Set<string>();
    config.routes.forEach((route, i) => {
      const kind = providerKinds.get(route.provider);
      if (kind === undefined) {
        ctx.addIssue({ code: 'custom', path: ['routes', i, 'provider'], message: `unknown provider '${route.provider}'` });
      } else if (route.dialect === 'images' && kind !== 'openai') {
        ctx.addIssue({
          code: 'custom',
          path: ['routes', i, 'dialect'],
          message: `${kind} provider '${route.provider}' cannot serve image generation`,
        });
      }
      if (models.has(route.model)) {
        ctx.addIssue({ code: 'custom', path: ['routes', i, 'model'], message: `duplicate model '${route.model}'` });
      }
      models.add(route.model);
    });
  });

export type GatewayFileConfig = z.infer<typeof gatewayFileSchema>;
export type ProviderConfig = z.infer<typeof providerSchema>;

/** Paths appended to an OpenAI-style `baseUrl` (which already ends in `/v1`). */
const OPENAI_PATHS: Record<Dialect, string> = {
  chat_completions: '/chat/completions',
  responses: '/responses',
  embeddings: '/embeddings',
  images: '/images/generations',
};

export function parseGatewayConfig(raw: unknown): GatewayFileConfig {
  const parsed = gatewayFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`invalid gateway config: ${details.join('; ')}`);
  }
  return parsed.data;
}

export async function readGatewayConfig(path: string): Promise<GatewayFileConfig> {
  const text = await readFile(path, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(`gateway config ${path} is not valid JSON`, { cause: err });
  }
  return parseGatewayConfig(raw);
}

function joinUrl(baseUrl: string, path: string): string {
  if (!path) return baseUrl;
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

export function buildRoutes(config: GatewayFileConfig): ModelRoute[] {
  const providers = new Map(config.providers.map((p) => [p.id, p]));
  return config.routes.map((route): ModelRoute => {
    const provider = providers.get(route.provider);
    if (!provider) throw new Error(`unknown provider '${route.provider}'`);
    const defaultPath = provider.kind === 'openai' ? OPENAI_PATHS[route.dialect] : '';
    return {
      modelName: route.model,
      providerId: provider.id,
      dialect: route.dialect,
      endpointUrl: joinUrl(provider.baseUrl, route.path ?? defaultPath),
      upstreamModel: route.upstreamModel,
      maxBatchSize: route.maxBatchSize,
    };
  });
}

export interface ProviderFactoryOptions {
  env?: NodeJS.ProcessEnv;
  /** Shared undici dispatcher for the HTTP upstreams (OpenAI-compatible and Gemini). */
  dispatcher?: Dispatcher;
}

export function createProvider(config: ProviderConfig, options: ProviderFactoryOptions = {}): UpstreamProviderPort {
  const env = options.env ?? process.env;
  switch (config.kind) {
    case 'openai':
      return new OpenAiCompatibleProvider({
        id: config.id,
        apiKey: config.apiKeyEnv ? env[config.apiKeyEnv] : undefined,
        headers: config.headers,
        dispatcher: options.dispatcher,
      });
    case 'ollama':
      return new OllamaProvider({ id: config.id, headers: config.headers });
    case 'gemini':
      return new GeminiProvider({
        id: config.id,
        apiKey: config.apiKeyEnv ? env[config.apiKeyEnv] : undefined,
        headers: config.headers,
        dispatcher: options.dispatcher,
      });
  }
}

/**
 * Applies a validated config: providers are rebuilt, then the registry swaps
 * in the new routes. Anything that can throw runs before either table changes.
 */
export function applyGatewayConfig(
  config: GatewayFileConfig,
  target: { registry: InMemoryModelRegistry; providers: Map<string, UpstreamProviderPort> },
  options: ProviderFactoryOptions = {},
): void {
  const routes = buildRoutes(config);
  const providers = config.providers.map((p) => createProvider(p, options));

  target.registry.reload(routes);
  target.providers.clear();
  for (const provider of providers) target.providers.set(provider.id, provider);
}
