import { timingSafeEqual } from 'node:crypto';
import type { CredentialVerifierPort, Principal } from '@ai-relay/domain';

export interface TeamKey {
  teamId: string;
  key: string;
}

export const ANONYMOUS: Principal = Object.freeze({ teamId: 'anonymous' });

function sameKey(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

/**
 * Accepts a fixed set of API keys, each bound to a team. With no keys
 * configured every caller is treated as `anonymous`.
 */
export class StaticCredentialVerifier implements CredentialVerifierPort {
  constructor(private readonly keys: readonly TeamKey[]) {}

  /** Parses `team-a=key-1,team-b=key-2`; a bare key belongs to team `default`. */
  static fromKeyList(list: string): StaticCredentialVerifier {
    const keys = list
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
      .map((entry): TeamKey => {
        const idx = entry.indexOf('=');
        if (idx < 0) return { teamId: 'default', key: entry };
        return { teamId: entry.slice(0, idx).trim(), key: entry.slice(idx + 1).trim() };
      });
    return new StaticCredentialVerifier(keys);
  }

  async verify(credential: string | null): Promise<Principal | null> {
    if (this.keys.length === 0) return ANONYMOUS;
    if (!credential) return null;
    const match = this.keys.find((entry) => sameKey(entry.key, credential));
    return match ? { teamId: match.teamId } : null;
  }
}
