import type { BoundedChannel } from '../utils/boundedChannel.js';
import { logger } from '../utils/logger.js';
import type { StreamFormat } from '../domain/talentQuery.js';
import type { StreamMessage } from '../talents/types.js';
import { renderStreamError, renderTalentRecord } from './views.js';

/** The parts of an HTTP response the event-stream writer touches (express Response satisfies it). */
export interface EventStreamTarget {
  setHeader(name: string, value: string): unknown;
  flushHeaders(): void;
  write(chunk: string): boolean;
  end(): unknown;
  on(event: 'close', listener: () => void): unknown;
  readonly writableEnded: boolean;
}

export type SseEvent = { event: string; data: string };

export const TALENT_EVENT = 'talent';
// Not "error": EventSource reserves that name for connection failures.
export const ERROR_EVENT = 'stream-error';
export const DONE_EVENT = 'done';
export const DONE_DATA = '[DONE]';

export function encodeSseEvent({ event, data }: SseEvent): string {
  const lines = data.split(/\r?\n/).map(line => `data: ${line}`);
  return `event: ${event}\n${lines.join('\n')}\n\n`;
}

export function toSseEvent(message: StreamMessage, format: StreamFormat): SseEvent {
  if (message.type === 'record') {
    return {
      event: TALENT_EVENT,
      data: format === 'json' ? JSON.stringify(message.record) : renderTalentRecord(message.record),
    };
  }
  return {
    event: ERROR_EVENT,
    data: format === 'json' ? JSON.stringify(message.error) : renderStreamError(message.error.message),
  };
}

export type PipeOptions = {
  format: StreamFormat;
  heartbeatMs: number;
};

export type PipeResult = {
  delivered: number;
  clientClosed: boolean;
};

/**
 * Drains the channel into an SSE response: one event per message, comment
 * heartbeats while idle, and a final `done` event once the producer closes the
 * channel. A client disconnect closes the channel's receiver so the producer
 * stops at its next send.
 */
export async function pipeChannelToEventStream(
  channel: BoundedChannel<StreamMessage>,
  target: EventStreamTarget,
  opts: PipeOptions
): Promise<PipeResult> {
  let clientClosed = false;
  let delivered = 0;

  target.on('close', () => {
    if (target.writableEnded) return;
    clientClosed = true;
    channel.closeReceiver();
  });

  target.setHeader('Content-Type', 'text/event-stream');
  target.setHeader('Cache-Control', 'no-cache');
  target.setHeader('Connection', 'keep-alive');
  // Disable proxy buffering (nginx) so events reach the browser immediately.
  target.setHeader('X-Accel-Buffering', 'no');
  target.flushHeaders();

  const heartbeat = setInterval(() => {
    if (!target.writableEnded && !clientClosed) target.write(': ping\n\n');
  }, opts.heartbeatMs);

  try {
    for await (const message of channel) {
      if (clientClosed) break;
      target.write(encodeSseEvent(toSseEvent(message, opts.format)));
      delivered += 1;
    }
  } finally {
    clearInterval(heartbeat);
  }

  if (clientClosed) {
    logger.info('talents_stream_client_closed', { delivered });
  } else {
    target.write(encodeSseEvent({ event: DONE_EVENT, data: DONE_DATA }));
    target.end();
    logger.info('talents_stream_completed', { delivered });
  }
  return { delivered, clientClosed };
}
