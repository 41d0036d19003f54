/**
 * Character and word error rates over decoded symbol sequences.
 */
import { SequenceErrorMeter, type Meter } from "@lockstep/engine";

export interface WordDelimiterPolicy<S> {
  isDelimiter(symbol: S): boolean;
}

export function delimiters<S>(...symbols: S[]): WordDelimiterPolicy<S> {
  const set = new Set(symbols);
  return { isDelimiter: (s) => set.has(s) };
}

/** Split on delimiter symbols; empty words (repeated or edge delimiters) are dropped. */
export function splitWords<S>(sequence: readonly S[], policy: WordDelimiterPolicy<S>): S[][] {
  const words: S[][] = [];
  let word: S[] = [];
  for (const s of sequence) {
    if (policy.isDelimiter(s)) {
      if (word.length > 0) words.push(word);
      word = [];
    } else {
      word.push(s);
    }
  }
  if (word.length > 0) words.push(word);
  return words;
}

/** CER as `value`; WER available alongside. Both accumulate until reset. */
export class ErrorRateMeter<S> implements Meter {
  readonly name: string;
  readonly cer: SequenceErrorMeter<S>;
  readonly wer: SequenceErrorMeter<string>;
  private readonly policy: WordDelimiterPolicy<S>;

  constructor(name: string, policy: WordDelimiterPolicy<S>) {
    this.name = name;
    this.policy = policy;
    this.cer = new SequenceErrorMeter(`${name} cer`);
    this.wer = new SequenceErrorMeter(`${name} wer`);
  }

  add(refs: readonly (readonly S[])[], hyps: readonly (readonly S[])[]): void {
    this.cer.add(refs, hyps);
    this.wer.add(refs.map((r) => this.words(r)), hyps.map((h) => this.words(h)));
  }

  private words(sequence: readonly S[]): string[] {
    return splitWords(sequence, this.policy).map((w) => w.map(String).join("\u001f"));
  }

  get value(): number | undefined {
    return this.cer.value;
  }

  reset(): void {
    this.cer.reset();
    this.wer.reset();
  }
}
