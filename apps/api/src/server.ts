import 'dotenv/config';
import { createServer } from 'http';
import { Agent } from 'undici';
import type { UpstreamProviderPort } from '@ai-relay/domain';
import { InMemoryModelRegistry, StaticCredentialVerifier, describeError } from '@ai-relay/adapters';

import { buildApp } from './app.js';
import { loadEnv } from './config/env.js';
import { applyGatewayConfig, readGatewayConfig } from './config/gateway-config.js';
import { BatchingCoordinator } from './services/batching/batching-coordinator.js';
import { DispatchCore } from './services/dispatch/dispatch-core.js';
import { HookRegistry } from './services/hooks/hook-registry.js';
import { GatewayMetrics } from './services/metrics/gateway-metrics.js';

async function main() {
  const env = loadEnv();
  const dispatcher = new Agent({ keepAliveTimeout: 30_000 });
  const registry = new InMemoryModelRegistry();
  const providers = new Map<string, UpstreamProviderPort>();

  const reload = async (): Promise<void> => {
    const config = await readGatewayConfig(env.GATEWAY_CONFIG_PATH);
    applyGatewayConfig(config, { registry, providers }, { dispatcher });
    console.log(`[server] loaded ${registry.size} model route(s) from ${env.GATEWAY_CONFIG_PATH}`);
  };
  await reload();

  const hooks = new HookRegistry();
  const metrics = env.METRICS_ENABLED ? new GatewayMetrics({ defaultMetrics: true }) : undefined;
  for (const hook of metrics?.hooks() ?? []) hooks.register(hook);

  const dispatch = new DispatchCore(
    {
      registry,
      providers,
      hooks,
      batching: new BatchingCoordinator(env.EMBEDDING_MAX_CONCURRENCY),
    },
    {
      upstreamTimeoutMs: env.UPSTREAM_TIMEOUT_MS,
      embeddingChunkSize: env.EMBEDDING_CHUNK_SIZE,
      streamBufferSize: env.STREAM_BUFFER_SIZE,
    },
  );

  const app = buildApp({
    dispatch,
    registry,
    verifier: StaticCredentialVerifier.fromKeyList(env.GATEWAY_API_KEYS),
    corsOrigin: env.CORS_ORIGIN,
    metrics,
  });
  const httpServer = createServer(app);

  httpServer.listen(env.PORT, () => {
    console.log(`[server] listening on http://0.0.0.0:${env.PORT}`);
  });

  process.on('SIGHUP', () => {
    reload().catch((err: unknown) => {
      console.warn('[server] reload failed, keeping previous routes', describeError(err));
    });
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    httpServer.close();
    await dispatcher.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      console.error('[server] shutdown failed', describeError(err));
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
