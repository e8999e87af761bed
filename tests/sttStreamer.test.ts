import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { SttStreamerOptions } from '../src/stt/sttStreamer';
import type { RecognitionRequest, RecognitionResult, SttProvider } from '../src/stt/types';
import { ScriptedSttProvider, SPEECH_AMPLITUDE, inboundFrame, sleep } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

async function createStreamer(provider: SttProvider, overrides: Partial<SttStreamerOptions> = {}) {
  const { SttStreamer } = await import('../src/stt/sttStreamer');
  return new SttStreamer({
    provider,
    frameMs: 20,
    silenceEndMs: 700,
    minUtteranceMs: 100,
    maxUtteranceMs: 10_000,
    preRollMs: 200,
    speechFramesRequired: 3,
    segmentQueueSize: 4,
    vadThreshold: 500,
    vadAdaptive: false,
    ...overrides,
  });
}

class Feeder {
  private index = 0;

  constructor(private readonly streamer: { ingest: (frame: ReturnType<typeof inboundFrame>) => unknown }) {}

  speech(frames: number): void {
    for (let i = 0; i < frames; i += 1) this.streamer.ingest(inboundFrame(this.index++, SPEECH_AMPLITUDE));
  }

  silence(frames: number): void {
    for (let i = 0; i < frames; i += 1) this.streamer.ingest(inboundFrame(this.index++, 0));
  }
}

test('2 s of speech and 800 ms of silence yield exactly one segment spanning the speech', async () => {
  const provider = new ScriptedSttProvider(['hello there', 'unexpected']);
  const streamer = await createStreamer(provider);
  const feed = new Feeder(streamer);

  feed.speech(100);
  feed.silence(40);

  const segment = await streamer.nextSegment();
  assert.equal(segment?.text, 'hello there');
  assert.equal(segment?.startMs, 0);
  assert.equal(segment?.endMs, 2000);
  assert.equal(segment?.reason, 'silence');
  assert.equal(segment?.confidence, 0.9);
  assert.equal(segment?.degraded, false);
  assert.equal(provider.requests.length, 1);
  assert.equal(provider.requests[0]?.audio.sampleRateHz, 16000);
  assert.equal(provider.requests[0]?.audio.samples.length, 135 * 320);

  await streamer.stop();
  assert.equal(await streamer.nextSegment(), null);
  assert.equal(provider.requests.length, 1);
});

test('a blip shorter than the minimum utterance is discarded', async () => {
  const provider = new ScriptedSttProvider(['should not be used']);
  const streamer = await createStreamer(provider);
  const feed = new Feeder(streamer);

  feed.speech(4);
  feed.silence(40);
  await streamer.stop();

  assert.equal(await streamer.nextSegment(), null);
  assert.equal(provider.requests.length, 0);
});

test('frame analysis reports the current speech run', async () => {
  const streamer = await createStreamer(new ScriptedSttProvider([]));
  const first = streamer.ingest(inboundFrame(0, SPEECH_AMPLITUDE));
  streamer.ingest(inboundFrame(1, SPEECH_AMPLITUDE));
  const third = streamer.ingest(inboundFrame(2, SPEECH_AMPLITUDE));
  const quiet = streamer.ingest(inboundFrame(3, 0));

  assert.deepEqual(first, { rms: SPEECH_AMPLITUDE, threshold: 500, isSpeech: true, speechRunMs: 20, inUtterance: false });
  assert.equal(third.speechRunMs, 60);
  assert.equal(third.inUtterance, true);
  assert.equal(quiet.isSpeech, false);
  assert.equal(quiet.speechRunMs, 0);
  streamer.abort();
});

test('long speech is split at the maximum utterance length', async () => {
  const provider = new ScriptedSttProvider(['first part', 'second part']);
  const streamer = await createStreamer(provider, { maxUtteranceMs: 500 });
  const feed = new Feeder(streamer);

  feed.speech(40);
  await streamer.stop();

  const first = await streamer.nextSegment();
  const second = await streamer.nextSegment();
  assert.deepEqual(
    [first?.text, first?.reason, first?.startMs, first?.endMs],
    ['first part', 'max_utterance', 0, 500],
  );
  assert.deepEqual(
    [second?.text, second?.reason, second?.startMs, second?.endMs],
    ['second part', 'stopped', 500, 800],
  );
});

test('a failed recognition produces a degraded empty segment', async () => {
  const streamer = await createStreamer(new ScriptedSttProvider([new Error('recognizer offline')]));
  const feed = new Feeder(streamer);

  feed.speech(10);
  feed.silence(35);

  const segment = await streamer.nextSegment();
  assert.equal(segment?.text, '');
  assert.equal(segment?.degraded, true);
  assert.equal(segment?.confidence, null);
  streamer.abort();
});

test('blank transcripts come out as empty segments', async () => {
  const { normalizeTranscript } = await import('../src/stt/sttStreamer');
  assert.equal(normalizeTranscript('  [BLANK_AUDIO] '), '');
  assert.equal(normalizeTranscript('hello   \n world '), 'hello world');

  const streamer = await createStreamer(new ScriptedSttProvider(['[blank_audio]']));
  const feed = new Feeder(streamer);
  feed.speech(10);
  feed.silence(35);
  await streamer.stop();

  const segment = await streamer.nextSegment();
  assert.deepEqual([segment?.text, segment?.degraded, segment?.confidence], ['', false, null]);
  assert.equal(await streamer.nextSegment(), null);
});

test('cancel finalizes a long enough utterance and leaves a short onset buffering', async () => {
  const streamer = await createStreamer(new ScriptedSttProvider(['interrupting']));
  const feed = new Feeder(streamer);

  feed.speech(4);
  streamer.cancel();
  assert.equal(streamer.isInUtterance(), true);

  feed.speech(4);
  streamer.cancel();
  assert.equal(streamer.isInUtterance(), false);

  const segment = await streamer.nextSegment();
  assert.equal(segment?.reason, 'cancelled');
  assert.equal(segment?.text, 'interrupting');
  streamer.abort();
});

class SlowFirstProvider implements SttProvider {
  public readonly id = 'disabled' as const;
  private calls = 0;

  async recognize(_request: RecognitionRequest): Promise<RecognitionResult> {
    this.calls += 1;
    const call = this.calls;
    if (call === 1) await sleep(30);
    return { text: `utterance ${call}` };
  }
}

test('segments come out in the order the utterances ended', async () => {
  const streamer = await createStreamer(new SlowFirstProvider());
  const feed = new Feeder(streamer);

  feed.speech(10);
  feed.silence(35);
  feed.speech(10);
  feed.silence(35);

  const first = await streamer.nextSegment();
  const second = await streamer.nextSegment();
  assert.equal(first?.text, 'utterance 1');
  assert.equal(second?.text, 'utterance 2');
  assert.equal(first?.confidence, null);
  streamer.abort();
});

class HangingProvider implements SttProvider {
  public readonly id = 'disabled' as const;
  public aborted = false;

  recognize(request: RecognitionRequest): Promise<RecognitionResult> {
    return new Promise((_resolve, reject) => {
      request.signal?.addEventListener('abort', () => {
        this.aborted = true;
        reject(new Error('aborted'));
      });
    });
  }
}

test('abort cancels in-flight recognition without emitting a segment', async () => {
  const provider = new HangingProvider();
  const streamer = await createStreamer(provider);
  const feed = new Feeder(streamer);

  feed.speech(10);
  feed.silence(35);
  await sleep(5);
  streamer.abort();

  assert.equal(provider.aborted, true);
  assert.equal(await streamer.nextSegment(), null);
});
