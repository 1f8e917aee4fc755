import type { Response } from 'express';
import type { SseStreamOptions, SseStream } from '../../shared/sse';

export const createSseStream = (res: Response, options: SseStreamOptions): SseStream => {
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.flushHeaders?.();

  const controller = new AbortController();
  let closed = false;

  const writable = () => !closed && !res.writableEnded && !res.destroyed;

  const heartbeat = setInterval(() => {
    if (writable()) {
      res.write(': heartbeat\n\n');
    }
  }, options.heartbeatMs);

  const close = () => {
    if (closed) {
      return;
    }
    closed = true;
    clearInterval(heartbeat);
    controller.abort();
    if (!res.writableEnded) {
      res.end();
    }
    options.onClose?.();
  };

  res.on('close', close);

  const writeFrame = (eventName: string, payload: unknown) => {
    if (!writable()) {
      return;
    }
    const data = typeof payload === 'string' ? payload : JSON.stringify(payload);
    res.write(`event: ${eventName}\n`);
    res.write(`data: ${data}\n\n`);
  };

  return {
    controller,
    send: (event) => writeFrame('stage-event', event),
    sendJson: (eventName, payload) => writeFrame(eventName, payload),
    close,
  };
};
