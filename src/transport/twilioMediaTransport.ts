import { randomUUID } from 'crypto';
import { decodeMuLaw, encodeMuLaw } from '../audio/g711';
import { resamplePcm16 } from '../audio/pcm';
import { TransportError } from '../errors';
import { log } from '../log';
import {
  incInboundAudioFrames,
  incInboundAudioFramesDropped,
  incOutboundAudioFramesDropped,
} from '../metrics';
import { AsyncQueue } from '../pipeline/asyncQueue';
import {
  TwilioInboundMessageSchema,
  type TwilioMediaMessage,
  type TwilioOutboundMessage,
  type TwilioStartMessage,
} from '../twilio/types';
import type {
  AudioFrame,
  DegradedEvent,
  DegradedReason,
  MediaSocket,
  MediaTransport,
  StreamStartInfo,
  TransportStats,
} from './types';

const WIRE_SAMPLE_RATE_HZ = 8000;
const MAX_GAP_FILL_FRAMES = 50;

/** Marks ride in the outbound queue so Twilio sees them after the audio they follow. */
type OutboundItem = { kind: 'media'; frame: AudioFrame } | { kind: 'mark'; name: string };

export interface TwilioMediaTransportOptions {
  socket: MediaSocket;
  inputSampleRateHz?: number;
  frameMs?: number;
  inboundQueueFrames: number;
  outboundQueueFrames: number;
  /** Interval between outbound frame sends; defaults to the frame duration. */
  outboundPaceMs?: number;
  logContext?: Record<string, unknown>;
}

/**
 * Twilio Media Streams adapter: base64 μ-law 8 kHz over JSON WebSocket messages in, PCM16
 * frames out. Outbound frames are held until the `start` event names the stream, then paced
 * onto the socket one frame per tick.
 */
export class TwilioMediaTransport implements MediaTransport {
  public readonly id = randomUUID();
  public readonly inputSampleRateHz: number;
  public readonly outputSampleRateHz = WIRE_SAMPLE_RATE_HZ;
  public readonly frameMs: number;

  private readonly socket: MediaSocket;
  private readonly inbound: AsyncQueue<AudioFrame>;
  private readonly outbound: AsyncQueue<OutboundItem>;
  private readonly outboundCapacity: number;
  private readonly paceMs: number;
  private readonly logContext: Record<string, unknown>;

  private startInfo?: StreamStartInfo;
  private pumpTimer?: NodeJS.Timeout;
  private closed = false;
  private closeReason?: string;
  private expectedChunk?: number;
  private inboundSeq = 0;
  private outboundSeq = 0;
  private streamTimeMs = 0;
  private drainWaiters: Array<() => void> = [];

  private readonly startListeners: Array<(info: StreamStartInfo) => void> = [];
  private readonly closeListeners: Array<(reason: string) => void> = [];
  private readonly degradedListeners: Array<(event: DegradedEvent) => void> = [];
  private readonly markListeners: Array<(name: string) => void> = [];
  private readonly dtmfListeners: Array<(digit: string) => void> = [];
  private readonly degradedCounts = new Map<DegradedReason, number>();

  private readonly counters: TransportStats = {
    framesReceived: 0,
    framesSent: 0,
    silenceFramesInserted: 0,
    lateFramesDropped: 0,
    inboundDropped: 0,
    outboundDropped: 0,
  };

  constructor(options: TwilioMediaTransportOptions) {
    this.socket = options.socket;
    this.inputSampleRateHz = options.inputSampleRateHz ?? 16000;
    this.frameMs = options.frameMs ?? 20;
    this.paceMs = options.outboundPaceMs ?? this.frameMs;
    this.outboundCapacity = options.outboundQueueFrames;
    this.logContext = { transport: 'twilio_media', transport_id: this.id, ...(options.logContext ?? {}) };

    this.inbound = new AsyncQueue<AudioFrame>({
      capacity: options.inboundQueueFrames,
      overflow: 'drop_oldest',
      onDrop: () => {
        this.counters.inboundDropped += 1;
        incInboundAudioFramesDropped('queue_overflow');
        this.degrade('inbound_overflow');
      },
    });
    this.outbound = new AsyncQueue<OutboundItem>({
      capacity: options.outboundQueueFrames,
      overflow: 'drop_oldest',
      onDrop: () => {
        this.counters.outboundDropped += 1;
        incOutboundAudioFramesDropped();
        this.degrade('outbound_overflow');
      },
    });
  }

  /** Feeds one raw WebSocket text message into the adapter. */
  public handleMessage(raw: string): void {
    if (this.closed) return;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      log.warn(
        {
          ...this.logContext,
          event: 'twilio_message_unparseable',
          err: new TransportError('media message is not json', { cause: error }),
        },
        'media message is not json',
      );
      this.degrade('malformed_message');
      return;
    }

    const parsed = TwilioInboundMessageSchema.safeParse(json);
    if (!parsed.success) {
      log.warn(
        { ...this.logContext, event: 'twilio_message_invalid', issues: parsed.error.issues.slice(0, 3) },
        'media message rejected',
      );
      this.degrade('malformed_message');
      return;
    }

    const message = parsed.data;
    switch (message.event) {
      case 'connected':
        log.debug({ ...this.logContext, event: 'twilio_stream_connected' }, 'media stream connected');
        return;
      case 'start':
        this.handleStart(message);
        return;
      case 'media':
        this.handleMedia(message);
        return;
      case 'mark':
        for (const listener of this.markListeners) listener(message.mark.name);
        return;
      case 'dtmf':
        for (const listener of this.dtmfListeners) listener(message.dtmf.digit);
        return;
      case 'stop':
        log.info({ ...this.logContext, event: 'twilio_stream_stopped' }, 'media stream stopped');
        void this.close('stream_stopped');
        return;
    }
  }

  /** The socket went away underneath us. */
  public handleSocketClosed(code?: number): void {
    this.shutdown(code === undefined ? 'socket_closed' : `socket_closed_${code}`, false);
  }

  public receive(signal?: AbortSignal): Promise<AudioFrame | null> {
    return this.inbound.shift(signal);
  }

  public send(frame: AudioFrame): boolean {
    if (this.closed) return false;
    return this.outbound.push({
      kind: 'media',
      frame: { ...frame, seq: this.outboundSeq++, direction: 'outbound' },
    });
  }

  public whenWritable(signal?: AbortSignal): Promise<void> {
    return this.outbound.whenBelow(Math.max(1, Math.floor(this.outboundCapacity / 2)), signal);
  }

  public whenDrained(signal?: AbortSignal): Promise<void> {
    if (this.outbound.size === 0 || this.closed || signal?.aborted) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      const done = (): void => {
        signal?.removeEventListener('abort', done);
        this.drainWaiters = this.drainWaiters.filter((waiter) => waiter !== done);
        resolve();
      };
      signal?.addEventListener('abort', done, { once: true });
      this.drainWaiters.push(done);
    });
  }

  public clearOutbound(): number {
    const cleared = this.outbound.clear();
    const streamSid = this.startInfo?.streamSid;
    if (streamSid && !this.closed) {
      this.write({ event: 'clear', streamSid });
    }
    this.notifyDrained();
    if (cleared > 0) {
      log.debug({ ...this.logContext, event: 'outbound_cleared', frames: cleared }, 'outbound audio cleared');
    }
    return cleared;
  }

  /** Twilio echoes the mark once the audio queued before it has played. */
  public mark(name: string): void {
    if (this.closed) return;
    const streamSid = this.startInfo?.streamSid;
    if (streamSid && this.outbound.size === 0) {
      this.write({ event: 'mark', streamSid, mark: { name } });
      return;
    }
    this.outbound.push({ kind: 'mark', name });
  }

  public async close(reason: string): Promise<void> {
    this.shutdown(reason, true);
  }

  public isClosed(): boolean {
    return this.closed;
  }

  public getStartInfo(): StreamStartInfo | undefined {
    return this.startInfo;
  }

  public onStart(cb: (info: StreamStartInfo) => void): void {
    if (this.startInfo) {
      cb(this.startInfo);
      return;
    }
    this.startListeners.push(cb);
  }

  public onClose(cb: (reason: string) => void): void {
    if (this.closed && this.closeReason !== undefined) {
      cb(this.closeReason);
      return;
    }
    this.closeListeners.push(cb);
  }

  public onDegraded(cb: (event: DegradedEvent) => void): void {
    this.degradedListeners.push(cb);
  }

  public onMark(cb: (name: string) => void): void {
    this.markListeners.push(cb);
  }

  public onDtmf(cb: (digit: string) => void): void {
    this.dtmfListeners.push(cb);
  }

  public stats(): TransportStats {
    return { ...this.counters };
  }

  private handleStart(message: TwilioStartMessage): void {
    if (this.startInfo) {
      log.warn({ ...this.logContext, event: 'twilio_duplicate_start' }, 'duplicate start event ignored');
      return;
    }
    const { start } = message;
    this.startInfo = {
      streamSid: start.streamSid,
      callSid: start.callSid,
      accountSid: start.accountSid,
      tracks: start.tracks,
      parameters: start.customParameters,
    };
    this.logContext.stream_sid = start.streamSid;
    this.logContext.call_sid = start.callSid;

    log.info(
      { ...this.logContext, event: 'twilio_stream_started', tracks: start.tracks, media_format: start.mediaFormat },
      'media stream started',
    );

    this.pumpTimer = setInterval(() => this.pumpOutbound(), this.paceMs);
    for (const listener of this.startListeners.splice(0)) listener(this.startInfo);
  }

  private handleMedia(message: TwilioMediaMessage): void {
    const { media } = message;
    if (media.track !== 'inbound' && media.track !== 'inbound_track') return;

    const chunk = media.chunk;
    if (chunk !== undefined && Number.isFinite(chunk)) {
      if (this.expectedChunk !== undefined) {
        if (chunk < this.expectedChunk) {
          this.counters.lateFramesDropped += 1;
          incInboundAudioFramesDropped('late');
          this.degrade('late_frame');
          return;
        }
        const gap = chunk - this.expectedChunk;
        if (gap > 0) {
          this.fillGap(gap);
        }
      }
      this.expectedChunk = chunk + 1;
    }

    const muLaw = Buffer.from(media.payload, 'base64');
    if (muLaw.length === 0) return;

    const pcm8k = decodeMuLaw(muLaw);
    const pcm16 =
      this.inputSampleRateHz === WIRE_SAMPLE_RATE_HZ
        ? pcm8k
        : resamplePcm16(pcm8k, WIRE_SAMPLE_RATE_HZ, this.inputSampleRateHz);

    this.counters.framesReceived += 1;
    incInboundAudioFrames();
    this.enqueueInbound(pcm16, false);
  }

  private fillGap(missing: number): void {
    const frames = Math.min(missing, MAX_GAP_FILL_FRAMES);
    const samples = Math.round((this.inputSampleRateHz * this.frameMs) / 1000);
    for (let i = 0; i < frames; i += 1) {
      this.enqueueInbound(new Int16Array(samples), true);
    }
    this.counters.silenceFramesInserted += frames;
    this.degrade('gap_filled', frames);
  }

  private enqueueInbound(pcm16: Int16Array, synthetic: boolean): void {
    const durationMs = (pcm16.length / this.inputSampleRateHz) * 1000;
    const frame: AudioFrame = {
      seq: this.inboundSeq++,
      direction: 'inbound',
      pcm16,
      sampleRateHz: this.inputSampleRateHz,
      timestampMs: this.streamTimeMs,
      durationMs,
      ...(synthetic ? { synthetic: true } : {}),
    };
    this.streamTimeMs += durationMs;
    this.inbound.push(frame);
  }

  private pumpOutbound(): void {
    const streamSid = this.startInfo?.streamSid;
    if (!streamSid || this.closed) return;

    let item = this.outbound.tryShift();
    while (item?.kind === 'mark') {
      this.write({ event: 'mark', streamSid, mark: { name: item.name } });
      item = this.outbound.tryShift();
    }
    if (!item) {
      this.notifyDrained();
      return;
    }

    const frame = item.frame;

    const pcm8k =
      frame.sampleRateHz === WIRE_SAMPLE_RATE_HZ
        ? frame.pcm16
        : resamplePcm16(frame.pcm16, frame.sampleRateHz, WIRE_SAMPLE_RATE_HZ);
    this.write({ event: 'media', streamSid, media: { payload: encodeMuLaw(pcm8k).toString('base64') } });
    this.counters.framesSent += 1;

    if (this.outbound.size === 0) {
      this.notifyDrained();
    }
  }

  private write(message: TwilioOutboundMessage): void {
    try {
      this.socket.send(JSON.stringify(message));
    } catch (error) {
      log.warn(
        {
          ...this.logContext,
          event: 'twilio_socket_send_failed',
          err: new TransportError('media socket send failed', { cause: error }),
        },
        'media socket send failed',
      );
      this.shutdown('socket_send_failed', false);
    }
  }

  private degrade(reason: DegradedReason, count = 1): void {
    const total = (this.degradedCounts.get(reason) ?? 0) + count;
    this.degradedCounts.set(reason, total);
    if (total === count || total % 50 < count) {
      log.warn({ ...this.logContext, event: 'transport_degraded', reason, total }, 'media transport degraded');
    }
    for (const listener of this.degradedListeners) listener({ reason, count });
  }

  private notifyDrained(): void {
    for (const waiter of [...this.drainWaiters]) waiter();
  }

  private shutdown(reason: string, closeSocket: boolean): void {
    if (this.closed) return;
    this.closed = true;
    this.closeReason = reason;

    if (this.pumpTimer) {
      clearInterval(this.pumpTimer);
      this.pumpTimer = undefined;
    }
    this.inbound.close();
    this.outbound.close();
    this.notifyDrained();

    if (closeSocket) {
      try {
        this.socket.close(1000, reason);
      } catch (error) {
        log.debug({ ...this.logContext, event: 'twilio_socket_close_failed', err: error }, 'socket close failed');
      }
    }

    log.info({ ...this.logContext, event: 'transport_closed', reason, stats: this.counters }, 'media transport closed');
    for (const listener of this.closeListeners.splice(0)) listener(reason);
  }
}
