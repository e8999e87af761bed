import type { OutcomeCode } from '../outcomes/types';
import type { TranscriptSegment } from '../stt/types';

export type MonitorIssueKind = 'voicemail' | 'do_not_call' | 'audio_issues' | 'call_too_long';

export interface MonitorIssue {
  kind: MonitorIssueKind;
  outcome: OutcomeCode;
  detail: string;
  /** Spoken before hanging up. Absent means hang up straight away. */
  closingText?: string;
}

export interface CallMonitorOptions {
  maxCallDurationMs: number;
  maxEmptySegments: number;
  maxConfusions: number;
  /** Left on an answering machine. Without one the call just ends. */
  voicemailMessage?: string;
  /** Voicemail greetings are only looked for in the first few caller segments. */
  voicemailWindow?: number;
}

export interface CallMonitorSummary {
  callerSegments: number;
  emptySegments: number;
  confusions: number;
  issues: MonitorIssueKind[];
}

const VOICEMAIL_PHRASES = [
  'leave a message',
  'leave your message',
  'after the beep',
  'after the tone',
  'voicemail',
  'voice mail',
  'not available to take your call',
];

const DO_NOT_CALL_PHRASES = ['do not call', 'stop calling', 'remove me', 'take me off your list', 'hanging up'];

const CONFUSION_PHRASES = [
  'what?',
  'what did you say',
  'can you repeat',
  'say that again',
  "i can't hear",
  'cant hear',
  'sorry?',
  'pardon?',
  'huh?',
  'excuse me?',
];

export const CLOSING_TEXT: Record<Exclude<MonitorIssueKind, 'voicemail'>, string> = {
  do_not_call: "Understood, we won't call you again. Goodbye.",
  audio_issues: "I'm having trouble hearing you, so I'll let you go. Goodbye.",
  call_too_long: 'I appreciate your time, but I should let you go. Have a great day!',
};

function containsAny(text: string, phrases: readonly string[]): boolean {
  return phrases.some((phrase) => text.includes(phrase));
}

/**
 * Watches a call for the cases the agent should not have to handle: answering machines,
 * do-not-call requests, a line nobody can hear on, and calls that run too long.
 * Each kind of issue is reported once.
 */
export class CallMonitor {
  private readonly options: CallMonitorOptions;
  private readonly voicemailWindow: number;
  private readonly issues: MonitorIssueKind[] = [];
  private callerSegments = 0;
  private emptySegments = 0;
  private confusions = 0;

  constructor(options: CallMonitorOptions) {
    this.options = options;
    this.voicemailWindow = options.voicemailWindow ?? 2;
  }

  /** Empty and degraded segments count towards `audio_issues`; spoken ones are checked for phrases. */
  public observeSegment(segment: TranscriptSegment): MonitorIssue | null {
    const text = segment.text.trim().toLowerCase().replace(/’/g, "'");

    if (segment.degraded || text === '') {
      this.emptySegments += 1;
      if (this.emptySegments >= this.options.maxEmptySegments) {
        return this.report('audio_issues', `${this.emptySegments} empty or failed transcriptions`);
      }
      return null;
    }

    this.callerSegments += 1;

    if (this.callerSegments <= this.voicemailWindow && containsAny(text, VOICEMAIL_PHRASES)) {
      return this.report('voicemail', segment.text);
    }
    if (containsAny(text, DO_NOT_CALL_PHRASES)) {
      return this.report('do_not_call', segment.text);
    }
    if (containsAny(text, CONFUSION_PHRASES)) {
      this.confusions += 1;
      if (this.confusions >= this.options.maxConfusions) {
        return this.report('audio_issues', `caller could not follow ${this.confusions} times`);
      }
    }
    return null;
  }

  public checkDuration(elapsedMs: number): MonitorIssue | null {
    if (elapsedMs < this.options.maxCallDurationMs) return null;
    return this.report('call_too_long', `call exceeded ${Math.round(this.options.maxCallDurationMs / 1000)}s`);
  }

  public summary(): CallMonitorSummary {
    return {
      callerSegments: this.callerSegments,
      emptySegments: this.emptySegments,
      confusions: this.confusions,
      issues: [...this.issues],
    };
  }

  private report(kind: MonitorIssueKind, detail: string): MonitorIssue | null {
    if (this.issues.includes(kind)) return null;
    this.issues.push(kind);

    switch (kind) {
      case 'voicemail':
        return { kind, outcome: 'voicemail', detail, closingText: this.options.voicemailMessage };
      case 'do_not_call':
        return { kind, outcome: 'hostile', detail, closingText: CLOSING_TEXT.do_not_call };
      case 'audio_issues':
        return { kind, outcome: 'audio_issues', detail, closingText: CLOSING_TEXT.audio_issues };
      case 'call_too_long':
        return { kind, outcome: 'call_too_long', detail, closingText: CLOSING_TEXT.call_too_long };
    }
  }
}
