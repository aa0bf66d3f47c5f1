import { describe, it, expect } from 'vitest';
import { VoiceConnection } from '../../src/websocket/VoiceConnection';
import type { ServerVoiceMessage } from '../../src/models/VoiceMessage';
import { ChatOrchestrator } from '../../src/services/ChatOrchestrator';
import { SessionStore } from '../../src/services/SessionStore';
import { QueryInterpreter } from '../../src/services/QueryInterpreter';
import { Retriever } from '../../src/services/Retriever';
import { ResponseGenerator } from '../../src/services/ResponseGenerator';
import { RateLimiter } from '../../src/services/RateLimiter';
import { RATE_LIMITS } from '../../src/config/constants';
import { logger } from '../../src/utils/logger';
import { MemoryKeyValueStore } from '../helpers/MemoryKeyValueStore';
import { FakeClock, FakeLLM, FakeTTS, FakeVectorIndex } from '../helpers/fakes';
import { voiceProfile } from '../helpers/testApp';

function setup(voiceChatLimit = 30) {
  const llm = new FakeLLM();
  const kv = new MemoryKeyValueStore();
  const limiter = new RateLimiter(kv, { ...RATE_LIMITS, 'voice-chat': { limit: voiceChatLimit, windowSeconds: 60 } });
  const sessions = new SessionStore(new MemoryKeyValueStore(), { ttlSeconds: 3600, maxMessages: 10 });
  const sent: ServerVoiceMessage[] = [];
  const connection = new VoiceConnection(
    {
      orchestrator: new ChatOrchestrator({
        sessions,
        interpreter: new QueryInterpreter(llm),
        retriever: new Retriever(new FakeVectorIndex(), { minScore: 0.3 }),
        generator: new ResponseGenerator(llm)
      }),
      sessions,
      tts: new FakeTTS(),
      limiter,
      profile: voiceProfile,
      safetyTimeoutMs: 15000,
      clock: new FakeClock()
    },
    (message) => sent.push(message),
    logger,
    '203.0.113.7'
  );
  return { llm, kv, sent, connection };
}

describe('VoiceConnection', () => {
  it('turns a final transcript into state, text and audio messages', async () => {
    const { llm, sent, connection } = setup();
    llm.fragments = ['Hello.'];

    await connection.handleMessage(JSON.stringify({ type: 'transcript', text: 'Who are you?', is_final: true }));

    expect(sent.map((m) => m.type)).toEqual(['state', 'state', 'audio', 'response_text', 'state']);
    expect(sent[2]).toEqual({
      type: 'audio',
      id: 1,
      text: 'Hello.',
      audio: Buffer.from('Hello.').toString('base64'),
      encoding: 'linear16',
      sample_rate: 16000
    });
    expect(sent[4]).toEqual({ type: 'state', state: 'speaking', reason: 'first audio handed to output' });
  });

  it('ignores interim transcripts', async () => {
    const { sent, connection } = setup();

    await connection.handleMessage(JSON.stringify({ type: 'transcript', text: 'Who are', is_final: false }));

    expect(sent).toEqual([]);
  });

  it('stops audio when the visitor starts speaking', async () => {
    const { llm, sent, connection } = setup();
    llm.fragments = ['Hello. ', 'Nice to meet you.'];
    await connection.handleMessage(JSON.stringify({ type: 'transcript', text: 'Who are you?' }));
    sent.length = 0;

    await connection.handleMessage(JSON.stringify({ type: 'speech_started' }));

    expect(sent).toEqual([
      { type: 'stop_audio' },
      { type: 'state', state: 'interrupted', reason: 'speech started' }
    ]);
  });

  it('charges final transcripts to the voice-chat bucket and refuses them over the limit', async () => {
    const { llm, kv, sent, connection } = setup(2);
    llm.fragments = ['Hello.'];

    for (const text of ['One?', 'Two?', 'Three?']) {
      await connection.handleMessage(JSON.stringify({ type: 'transcript', text }));
    }

    expect(llm.streamCalls).toHaveLength(2);
    expect(llm.completeCalls).toHaveLength(2);
    expect(kv.entries.get('rl:voice-chat:203.0.113.7')?.value).toBe('3');
    expect(sent[sent.length - 1]).toEqual({ type: 'error', message: 'Rate limit exceeded', retry_after: 60 });
  });

  it('answers malformed messages with an error', async () => {
    const { sent, connection } = setup();

    await connection.handleMessage('not json');
    await connection.handleMessage(JSON.stringify({ type: 'dance' }));

    expect(sent).toEqual([
      { type: 'error', message: 'Invalid JSON' },
      { type: 'error', message: 'Unknown message' }
    ]);
  });
});
