import type { Response } from 'express';

function waitForDrain(res: Response): Promise<void> {
  return new Promise((resolve) => {
    const done = (): void => {
      res.off('drain', done);
      res.off('close', done);
      resolve();
    };
    res.once('drain', done);
    res.once('close', done);
  });
}

/**
 * Writes pre-rendered SSE frames to the response, waiting for `drain`
 * whenever the socket buffer is full. Leaving the loop early (client gone)
 * closes the frame iterator, which cancels the producer behind it.
 */
export async function writeSse(res: Response, frames: AsyncIterable<string>): Promise<void> {
  res.status(200);
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.setHeader('X-Accel-Buffering', 'no');
  res.flushHeaders();

  for await (const frame of frames) {
    if (res.destroyed || res.writableEnded) break;
    if (!res.write(frame)) await waitForDrain(res);
  }

  if (!res.writableEnded) res.end();
}
