import assert from 'node:assert/strict';
import { test } from 'node:test';
import { splitForSpeech, splitSentences } from '../src/tts/sentenceSplitter';

test('splitSentences splits at sentence punctuation', () => {
  assert.deepEqual(splitSentences('Hello there, how are you today? I am calling about your order.'), [
    'Hello there, how are you today?',
    'I am calling about your order.',
  ]);
});

test('abbreviations do not end a sentence', () => {
  assert.deepEqual(splitSentences('Dr. Smith will see you at noon. Please arrive early.'), [
    'Dr. Smith will see you at noon.',
    'Please arrive early.',
  ]);
});

test('decimals and ellipses stay inside their sentence', () => {
  assert.deepEqual(splitSentences('The total is 3.50 dollars. Thanks!'), ['The total is 3.50 dollars. Thanks!']);
  assert.deepEqual(splitSentences('Well... Let me check that for you.'), ['Well... Let me check that for you.']);
});

test('short sentences merge into the next one', () => {
  assert.deepEqual(splitSentences('Yes. Okay. That works for me nicely.'), ['Yes. Okay. That works for me nicely.']);
  assert.deepEqual(splitSentences('   '), []);
});

test('splitForSpeech cuts long sentences at clauses', () => {
  assert.deepEqual(splitForSpeech('We have openings on Monday morning, Tuesday afternoon and Wednesday evening.', 40), [
    'We have openings on Monday morning,',
    'Tuesday afternoon and Wednesday evening.',
  ]);
});

test('splitForSpeech falls back to word boundaries', () => {
  assert.deepEqual(splitForSpeech('Alpha beta gamma delta.', 10), ['Alpha beta', 'gamma', 'delta.']);
});
