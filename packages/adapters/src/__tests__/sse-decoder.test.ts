import { describe, it, expect } from '@jest/globals';
import { decodeSse } from '../openai/sse-decoder.js';
import type { SseMessage } from '../openai/sse-decoder.js';

async function* chunks(...parts: string[]): AsyncGenerator<Uint8Array> {
  const encoder = new TextEncoder();
  for (const part of parts) yield encoder.encode(part);
}

async function decodeAll(...parts: string[]): Promise<SseMessage[]> {
  const out: SseMessage[] = [];
  for await (const message of decodeSse(chunks(...parts))) out.push(message);
  return out;
}

describe('decodeSse', () => {
  it('splits blank-line terminated blocks', async () => {
    expect(await decodeAll('data: one\n\ndata: two\n\n')).toEqual([{ data: 'one' }, { data: 'two' }]);
  });

  it('reassembles lines split across chunks', async () => {
    expect(await decodeAll('da', 'ta: {"a"', ':1}\n', '\n')).toEqual([{ data: '{"a":1}' }]);
  });

  it('keeps the event name and joins multi-line data', async () => {
    expect(await decodeAll('event: delta\ndata: first\ndata: second\n\n')).toEqual([
      { event: 'delta', data: 'first\nsecond' },
    ]);
  });

  it('skips comments and tolerates CRLF line endings', async () => {
    expect(await decodeAll(': keep-alive\r\n\r\ndata: x\r\n\r\n')).toEqual([{ data: 'x' }]);
  });

  it('delivers a trailing block that never got its blank line', async () => {
    expect(await decodeAll('data: a\n\ndata: tail')).toEqual([{ data: 'a' }, { data: 'tail' }]);
  });

  it('ignores blocks that carry no data', async () => {
    expect(await decodeAll('event: ping\n\nid: 7\n\n')).toEqual([]);
  });
});
