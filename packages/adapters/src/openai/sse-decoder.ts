export interface SseMessage {
  event?: string;
  data: string;
}

export const DONE_MARKER = '[DONE]';

/**
 * Reads a `text/event-stream` body and yields one message per blank-line
 * terminated block. Comment lines (`:`) are skipped; several `data:` lines in
 * one block are joined with `\n`. A trailing block without its blank line is
 * still delivered when the body ends.
 */
export async function* decodeSse(
  body: AsyncIterable<Uint8Array | string>,
): AsyncGenerator<SseMessage> {
  const decoder = new TextDecoder();
  let buffer = '';
  let event: string | undefined;
  let data: string[] = [];

  function* flushLine(rawLine: string): Generator<SseMessage> {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;

    if (line === '') {
      if (data.length > 0) {
        yield event === undefined ? { data: data.join('\n') } : { event, data: data.join('\n') };
      }
      event = undefined;
      data = [];
      return;
    }
    if (line.startsWith(':')) return;

    const colon = line.indexOf(':');
    const field = colon < 0 ? line : line.slice(0, colon);
    let value = colon < 0 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) value = value.slice(1);

    if (field === 'data') data.push(value);
    else if (field === 'event') event = value;
  }

  for await (const chunk of body) {
    buffer += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
    let newline = buffer.indexOf('\n');
    while (newline >= 0) {
      const line = buffer.slice(0, newline);
      buffer = buffer.slice(newline + 1);
      yield* flushLine(line);
      newline = buffer.indexOf('\n');
    }
  }

  buffer += decoder.decode();
  if (buffer.length > 0) yield* flushLine(buffer);
  yield* flushLine('');
}
