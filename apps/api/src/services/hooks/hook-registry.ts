import { createCanonicalRequest, GatewayError, isGatewayError } from '@ai-relay/domain';
import type {
  CanonicalRequest,
  CanonicalResponse,
  ErrorHook,
  GatewayHook,
  HookContext,
  RequestHook,
  StreamEvent,
  StreamHook,
} from '@ai-relay/domain';
import { createLogger, describeError } from '@ai-relay/adapters';

const log = createLogger('hooks');

function hookFailure(hook: GatewayHook, err: unknown): GatewayError {
  // A hook may reject a call on purpose by throwing a GatewayError.
  if (isGatewayError(err)) return err;
  log.error(`hook '${hook.name}' failed`, { kind: hook.kind, error: describeError(err) });
  return GatewayError.internal(err);
}

function returned<T extends object>(value: T | void): value is T {
  return value !== undefined;
}

/** Ordered hook lists; hooks run in registration order. */
export class HookRegistry {
  private readonly requestHooks: RequestHook[] = [];
  private readonly streamHooks: StreamHook[] = [];
  private readonly errorHooks: ErrorHook[] = [];

  register(hook: GatewayHook): this {
    switch (hook.kind) {
      case 'request':
        this.requestHooks.push(hook);
        break;
      case 'stream':
        this.streamHooks.push(hook);
        break;
      case 'error':
        this.errorHooks.push(hook);
        break;
    }
    return this;
  }

  get hasStreamHooks(): boolean {
    return this.streamHooks.length > 0;
  }

  async beforeRequest(request: CanonicalRequest, ctx: HookContext): Promise<CanonicalRequest> {
    let current = request;
    for (const hook of this.requestHooks) {
      if (!hook.beforeRequest) continue;
      try {
        const replacement = await hook.beforeRequest(current, ctx);
        if (returned(replacement)) current = createCanonicalRequest(replacement);
      } catch (err) {
        throw hookFailure(hook, err);
      }
    }
    return current;
  }

  async afterResponse(
    request: CanonicalRequest,
    response: CanonicalResponse,
    ctx: HookContext,
  ): Promise<CanonicalResponse> {
    let current = response;
    for (const hook of this.requestHooks) {
      if (!hook.afterResponse) continue;
      try {
        const replacement = await hook.afterResponse(request, current, ctx);
        if (returned(replacement)) current = replacement;
      } catch (err) {
        throw hookFailure(hook, err);
      }
    }
    return current;
  }

  /** `null` when a hook dropped the event. */
  applyStream(event: StreamEvent, ctx: HookContext): StreamEvent | null {
    let current: StreamEvent | null = event;
    for (const hook of this.streamHooks) {
      if (current === null) break;
      try {
        current = hook.onEvent(current, ctx);
      } catch (err) {
        throw hookFailure(hook, err);
      }
    }
    return current;
  }

  notifyError(error: GatewayError, ctx: HookContext): void {
    for (const hook of this.errorHooks) {
      try {
        hook.onError(error, ctx);
      } catch (err) {
        log.warn(`error hook '${hook.name}' failed`, { error: describeError(err) });
      }
    }
  }
}
