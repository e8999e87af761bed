import type { AgentService } from '../agent/types';
import type { OutcomeSink } from '../outcomes/types';
import type { SttProvider } from '../stt/types';
import type { CalendarService } from '../tools/calendar';
import type { CallControl, ToolHandlers } from '../tools/types';
import type { MediaTransport, StreamStartInfo } from '../transport/types';
import type { TtsProvider } from '../tts/types';

export type CallSessionId = string;

export type TurnState = 'listening' | 'thinking' | 'speaking' | 'interrupted';

export type SpeechKind = 'greeting' | 'reply' | 'reprompt' | 'apology' | 'closing';

/** Per-call tuning. Defaults come from the environment, see `sessionSettingsFromEnv`. */
export interface CallSessionSettings {
  silenceEndMs: number;
  minUtteranceMs: number;
  maxUtteranceMs: number;
  preRollMs: number;
  speechFramesRequired: number;
  segmentQueueSize: number;
  vadThreshold: number;
  vadAdaptive: boolean;
  language?: string;
  bargeInMinSpeechMs: number;
  bargeInEchoGuardMs: number;
  deadAirMs: number;
  deadAirMaxReprompts: number;
  maxCallDurationMs: number;
  monitorMaxEmptySegments: number;
  monitorMaxConfusions: number;
  voicemailMessage?: string;
  /** How long teardown waits for the last utterance to be transcribed. */
  sttFlushTimeoutMs: number;
  maxToolRounds: number;
  toolTimeoutMs: number;
  ttsRequestSampleRateHz: number;
  ttsMaxChunkChars: number;
  ttsVoice?: string;
  apologyText: string;
  greetingText?: string;
  transferNumber?: string;
}

export interface CallSessionDeps {
  transport: MediaTransport;
  startInfo: StreamStartInfo;
  sttProvider: SttProvider;
  ttsProvider: TtsProvider;
  agent: AgentService;
  outcomeSink: OutcomeSink;
  calendar: CalendarService;
  callControl: CallControl;
  settings: CallSessionSettings;
  toolHandlers?: Partial<ToolHandlers>;
  sessionId?: CallSessionId;
  now?: () => number;
}
