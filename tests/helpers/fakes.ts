import type { CompletionOptions, LLMProvider, Message } from '../../src/providers/LLMProvider';
import type { VectorIndex, VectorMatch, VectorQuery } from '../../src/providers/VectorIndex';
import type { TTSProvider } from '../../src/providers/TTSProvider';
import type { AudioOutput } from '../../src/services/VoiceTurnController';
import type { AudioFragment } from '../../src/models/VoiceState';
import type { DocumentChunk } from '../../src/models/DocumentChunk';

export function chunk(id: string, content: string, source = 'resume.md', category?: string, headers: string[] = []): DocumentChunk {
  return { id, content, metadata: { source, category, headers } };
}

export function match(c: DocumentChunk, score: number): VectorMatch {
  return { chunk: c, score };
}

/**
 * Returns canned matches; category-filtered queries only see chunks of that category
 */
export class FakeVectorIndex implements VectorIndex {
  readonly queries: VectorQuery[] = [];
  failWith?: Error;

  constructor(private matches: VectorMatch[] = []) {}

  async query(query: VectorQuery): Promise<VectorMatch[]> {
    this.queries.push(query);
    if (this.failWith) {
      throw this.failWith;
    }
    return this.matches
      .filter((m) => !query.category || m.chunk.metadata.category === query.category)
      .slice(0, query.topK);
  }
}

/**
 * Scripted completion provider. `stream()` yields `fragments` in order and
 * stops as soon as the request's signal is aborted.
 */
export class FakeLLM implements LLMProvider {
  readonly completeCalls: Array<{ messages: Message[]; options?: CompletionOptions }> = [];
  readonly streamCalls: Array<{ messages: Message[]; options?: CompletionOptions }> = [];

  completion: string | Error = '{"needs_retrieval": true, "refined_query": "", "direct_response": null}';
  fragments: string[] = [];
  streamError?: Error;
  /** Resolved before each fragment is yielded, when set */
  gate?: () => Promise<void>;

  async complete(messages: Message[], options?: CompletionOptions): Promise<string> {
    this.completeCalls.push({ messages, options });
    if (this.completion instanceof Error) {
      throw this.completion;
    }
    return this.completion;
  }

  async *stream(messages: Message[], options?: CompletionOptions): AsyncGenerator<string> {
    this.streamCalls.push({ messages, options });
    for (const fragment of this.fragments) {
      if (this.gate) {
        await this.gate();
      }
      if (options?.signal?.aborted) {
        return;
      }
      yield fragment;
    }
    if (this.streamError) {
      throw this.streamError;
    }
  }

  getName(): string {
    return 'fake-llm';
  }
}

export class FakeTTS implements TTSProvider {
  readonly texts: string[] = [];

  async synthesize(text: string): Promise<Buffer> {
    this.texts.push(text);
    return Buffer.from(text);
  }

  getAudioFormat() {
    return { encoding: 'linear16', sampleRate: 16000, channels: 1 };
  }

  getName(): string {
    return 'fake-tts';
  }
}

export class RecordingOutput implements AudioOutput {
  readonly played: AudioFragment[] = [];
  stops = 0;

  play(fragment: AudioFragment): void {
    this.played.push(fragment);
  }

  stop(): void {
    this.stops++;
  }
}

export class FakeClock {
  constructor(public current = 0) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

/**
 * Promise whose resolution the test controls
 */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export async function collect(iterable: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const item of iterable) {
    out.push(item);
  }
  return out;
}
