import abbreviationList from './abbreviations.json';

const ABBREVIATIONS: ReadonlySet<string> = new Set(abbreviationList.map((item) => item.toLowerCase()));

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+(?=[A-Z"'])/;
const CLAUSE_BOUNDARY = /(?<=[,;])\s+|\s+(?=(?:and|but|or|so|because|however|therefore)\s)/;

export const MIN_CHUNK_CHARS = 15;

/** True when a period at the end of `piece` does not end the sentence. */
function endsWithProtectedPeriod(piece: string): boolean {
  if (piece.endsWith('...')) return true;
  if (!piece.endsWith('.')) return false;
  const lastWord = piece.slice(0, -1).split(/\s+/).pop() ?? '';
  return ABBREVIATIONS.has(lastWord.replace(/^[("']+/, '').toLowerCase());
}

/**
 * Sentence split for speech: abbreviations, decimals and ellipses never end a sentence, and
 * sentences shorter than `minChunkChars` are merged into the following one.
 */
export function splitSentences(text: string, minChunkChars = MIN_CHUNK_CHARS): string[] {
  const trimmed = text.replace(/\s+/g, ' ').trim();
  if (trimmed === '') return [];

  const sentences: string[] = [];
  for (const piece of trimmed.split(SENTENCE_BOUNDARY)) {
    const last = sentences[sentences.length - 1];
    if (last !== undefined && endsWithProtectedPeriod(last)) {
      sentences[sentences.length - 1] = `${last} ${piece}`;
    } else {
      sentences.push(piece);
    }
  }

  const merged: string[] = [];
  let buffer = '';
  for (const sentence of sentences) {
    buffer = buffer ? `${buffer} ${sentence}` : sentence;
    if (buffer.length >= minChunkChars) {
      merged.push(buffer);
      buffer = '';
    }
  }
  if (buffer) {
    if (merged.length > 0) {
      merged[merged.length - 1] = `${merged[merged.length - 1]} ${buffer}`;
    } else {
      merged.push(buffer);
    }
  }
  return merged;
}

function splitLongPart(part: string, maxChars: number): string[] {
  if (part.length <= maxChars) return [part];
  const out: string[] = [];
  let current = '';
  for (const word of part.split(' ')) {
    if (current && current.length + word.length + 1 > maxChars) {
      out.push(current);
      current = word;
    } else {
      current = current ? `${current} ${word}` : word;
    }
  }
  if (current) out.push(current);
  return out;
}

/** Sentences no longer than `maxChars`; longer ones are cut at commas and conjunctions. */
export function splitForSpeech(text: string, maxChars: number): string[] {
  const chunks: string[] = [];
  for (const sentence of splitSentences(text)) {
    if (sentence.length <= maxChars) {
      chunks.push(sentence);
      continue;
    }

    let current = '';
    for (const rawPart of sentence.split(CLAUSE_BOUNDARY)) {
      const part = rawPart.trim();
      if (!part) continue;
      if (!current) {
        current = part;
      } else if (current.length + part.length + 1 <= maxChars) {
        current = `${current} ${part}`;
      } else {
        chunks.push(...splitLongPart(current, maxChars));
        current = part;
      }
    }
    if (current) chunks.push(...splitLongPart(current, maxChars));
  }
  return chunks;
}
