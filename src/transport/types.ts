export type FrameDirection = 'inbound' | 'outbound';

/** One fixed-duration chunk of mono PCM16 audio travelling through the pipeline. */
export interface AudioFrame {
  seq: number;
  direction: FrameDirection;
  pcm16: Int16Array;
  sampleRateHz: number;
  /** Stream time of the first sample. */
  timestampMs: number;
  durationMs: number;
  /** Inserted silence standing in for a lost wire frame. */
  synthetic?: boolean;
}

export interface StreamStartInfo {
  streamSid: string;
  callSid: string;
  accountSid: string;
  tracks: string[];
  parameters: Record<string, string>;
}

export type DegradedReason =
  | 'inbound_overflow'
  | 'outbound_overflow'
  | 'malformed_message'
  | 'gap_filled'
  | 'late_frame';

export interface DegradedEvent {
  reason: DegradedReason;
  count: number;
}

export interface TransportStats {
  framesReceived: number;
  framesSent: number;
  silenceFramesInserted: number;
  lateFramesDropped: number;
  inboundDropped: number;
  outboundDropped: number;
}

/**
 * Bidirectional audio stream for one call. `receive` yields decoded inbound frames at
 * `inputSampleRateHz`; `send` takes frames at any rate and encodes them for the wire.
 */
export interface MediaTransport {
  readonly id: string;
  readonly inputSampleRateHz: number;
  readonly outputSampleRateHz: number;
  readonly frameMs: number;

  receive(signal?: AbortSignal): Promise<AudioFrame | null>;
  send(frame: AudioFrame): boolean;
  whenWritable(signal?: AbortSignal): Promise<void>;
  whenDrained(signal?: AbortSignal): Promise<void>;
  clearOutbound(): number;
  mark(name: string): void;
  close(reason: string): Promise<void>;
  isClosed(): boolean;

  getStartInfo(): StreamStartInfo | undefined;
  onStart(cb: (info: StreamStartInfo) => void): void;
  onClose(cb: (reason: string) => void): void;
  onDegraded(cb: (event: DegradedEvent) => void): void;
  onMark(cb: (name: string) => void): void;
  onDtmf(cb: (digit: string) => void): void;
  stats(): TransportStats;
}

/** The part of a WebSocket the transport writes to. */
export interface MediaSocket {
  send(data: string): void;
  close(code?: number, reason?: string): void;
}
