import type { FastifyBaseLogger } from 'fastify';

import type { ClientRegistry, ClientTransport } from './clientRegistry.js';
import type { MediaEngine, MediaSession, PushedFrame, SampleFormat } from './mediaEngine.js';
import type { MediaMetrics } from './metrics.js';
import { err, ok, type Result } from './result.js';
import { formatOneLineError } from './util/text.js';

/** Push surface the upstream device pipeline feeds decoded samples into. */
export interface FrameSink {
  open(format: SampleFormat): Result<SampleFormat>;
  push(frame: PushedFrame): Result<number>;
  close(): void;
}

type SinkState = 'idle' | 'open' | 'closed';

export type FrameSinkAdapterOptions = Readonly<{
  registry: ClientRegistry<ClientTransport, MediaSession>;
  engine: MediaEngine;
  log: FastifyBaseLogger;
  metrics?: MediaMetrics;
}>;

/**
 * Fans pushed frames out to the media session of every attached viewer. A viewer without a
 * session yet (still negotiating) is skipped.
 */
export class FrameSinkAdapter implements FrameSink {
  private readonly opts: FrameSinkAdapterOptions;
  private state: SinkState = 'idle';
  private format: SampleFormat | null = null;

  constructor(opts: FrameSinkAdapterOptions) {
    this.opts = opts;
  }

  get activeFormat(): SampleFormat | null {
    return this.format;
  }

  open(format: SampleFormat): Result<SampleFormat> {
    if (this.state !== 'idle') {
      return err('INVALID_STATE', `Frame sink cannot be opened while ${this.state}`);
    }
    if (!this.opts.engine.supportsFormat(format)) {
      return err('UNSUPPORTED_FORMAT', `Media engine cannot carry ${format.kind}/${format.codec}`);
    }
    this.format = format;
    this.state = 'open';
    this.opts.log.debug({ format }, 'frame_sink_opened');
    return ok(format);
  }

  push(frame: PushedFrame): Result<number> {
    const format = this.format;
    if (this.state !== 'open' || !format) {
      return err('INVALID_STATE', 'Frame sink is not open');
    }
    this.opts.metrics?.framesPushedTotal.inc();

    let forwarded = 0;
    let corrupt = false;
    this.opts.registry.forEachConnected((slot) => {
      if (!slot.transport) {
        corrupt = true;
        return;
      }
      const session = slot.session;
      if (!session) return;
      try {
        session.sendFrame(frame, format);
        forwarded += 1;
      } catch (e) {
        this.opts.metrics?.frameForwardErrorsTotal.inc();
        this.opts.log.warn({ clientIndex: slot.index, err: formatOneLineError(e, 256) }, 'frame_forward_failed');
      }
    });

    if (corrupt) {
      return err('INTERNAL_ERROR', 'Connected client slot has no transport');
    }
    return ok(forwarded);
  }

  close(): void {
    if (this.state === 'closed') return;
    this.state = 'closed';
    this.opts.log.debug('frame_sink_closed');
  }
}
