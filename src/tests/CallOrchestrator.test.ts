import { describe, it, expect } from 'vitest';
import { CallConnectionRegistry } from '../core/CallConnectionRegistry';
import { CallOrchestrator } from '../core/CallOrchestrator';
import { CallSessionStore } from '../core/CallSessionStore';
import { MetricsCollector } from '../core/MetricsCollector';
import { SpeechSynthesisPump } from '../core/SpeechSynthesisPump';
import { ILLM, ITTS } from '../types';
import { FakeConnection, FakeLLM, FakeTTS } from './helpers/fakes';

const SYSTEM_PROMPT = 'You are a test agent.';
const APOLOGY = 'Sorry, could you say that again?';

function setup(llm: ILLM, tts: ITTS = new FakeTTS()) {
  const registry = new CallConnectionRegistry();
  const connection = new FakeConnection();
  connection.bind('CA-1', 'MZ-1');
  registry.register('CA-1', connection);

  const metrics = new MetricsCollector();
  const pump = new SpeechSynthesisPump({
    tts,
    registry,
    frameBytes: 160,
    frameDurationMs: 0,
    pacingLeadFrames: 0,
  });
  const orchestrator = new CallOrchestrator({ llm, pump, registry, metrics, systemPrompt: SYSTEM_PROMPT, apology: APOLOGY });

  const sessions = new CallSessionStore();
  const session = sessions.getOrCreate({ callId: 'CA-1', from: '+1', to: '+2' });
  session.history.addUser('hi');

  return { orchestrator, connection, metrics, session, sessions };
}

describe('CallOrchestrator', () => {
  it('speaks each sentence in order and records the reply', async () => {
    const llm = new FakeLLM(['Hello ', 'there. ', 'How can I ', 'help?']);
    const tts = new FakeTTS();
    const { orchestrator, connection, metrics, session } = setup(llm, tts);

    expect(orchestrator.startTurn(session, 'hi')).toBe('started');
    await orchestrator.waitForIdle('CA-1');

    expect(tts.calls).toEqual(['Hello there.', 'How can I help?']);
    expect(connection.marks()).toEqual(['Hello there.', 'How can I help?']);
    expect(session.history.lastTurn()).toMatchObject({
      role: 'assistant',
      content: 'Hello there. How can I help?',
    });
    expect(llm.requests[0]).toEqual([
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: 'hi' },
    ]);

    const summary = metrics.getCallMetrics('CA-1');
    expect(summary.turns).toBe(1);
    expect(summary.totalFrames).toBe(2);
  });

  it('finishes speaking a sentence before pulling the next chunk', async () => {
    const events: string[] = [];
    const llm: ILLM = {
      generate: async () => ({ text: '', finishReason: 'stop' }),
      async *generateStream() {
        events.push('pull:0');
        yield 'A one. ';
        events.push('pull:1');
        yield 'B two. ';
      },
    };
    const tts: ITTS = {
      synthesize: async (text) => {
        events.push(`tts:${text}`);
        return { audioBuffer: Buffer.alloc(40, 1), duration: 0.005, characterCount: text.length };
      },
    };
    const { orchestrator, session } = setup(llm, tts);

    orchestrator.startTurn(session, 'hi');
    await orchestrator.waitForIdle('CA-1');

    expect(events).toEqual(['pull:0', 'tts:A one.', 'pull:1', 'tts:B two.']);
  });

  it('refuses a second turn while one is running', async () => {
    const llm = new FakeLLM(['Sure. ']);
    const { orchestrator, session } = setup(llm);
    llm.hold();

    expect(orchestrator.startTurn(session, 'hi')).toBe('started');
    expect(orchestrator.isBusy('CA-1')).toBe(true);
    expect(orchestrator.startTurn(session, 'hello?')).toBe('busy');

    llm.release();
    await orchestrator.waitForIdle('CA-1');
    expect(orchestrator.isBusy('CA-1')).toBe(false);
    expect(llm.requests).toHaveLength(1);
  });

  it('refuses to start without a media connection', () => {
    const llm = new FakeLLM(['Sure.']);
    const { orchestrator, sessions } = setup(llm);
    const other = sessions.getOrCreate({ callId: 'CA-2', from: '+1', to: '+2' });

    expect(orchestrator.startTurn(other, 'hi')).toBe('no_connection');
    expect(orchestrator.isBusy('CA-2')).toBe(false);
    expect(llm.requests).toEqual([]);
  });

  it('cancels an in-flight turn without speaking', async () => {
    const llm = new FakeLLM(['Never said. ']);
    const tts = new FakeTTS();
    const { orchestrator, session } = setup(llm, tts);
    llm.hold();

    orchestrator.startTurn(session, 'hi');
    expect(orchestrator.cancel('CA-1', 'hangup')).toBe(true);
    llm.release();
    await orchestrator.waitForIdle('CA-1');

    expect(tts.calls).toEqual([]);
    expect(session.history.length).toBe(1);
    expect(orchestrator.cancel('CA-1')).toBe(false);
  });

  it('keeps what was spoken when cancelled part way', async () => {
    let orchestrator: CallOrchestrator | null = null;
    const llm: ILLM = {
      generate: async () => ({ text: '', finishReason: 'stop' }),
      async *generateStream() {
        yield 'First. ';
        orchestrator?.cancel('CA-1', 'hangup');
        yield 'Second. ';
      },
    };
    const tts = new FakeTTS();
    const context = setup(llm, tts);
    orchestrator = context.orchestrator;

    context.orchestrator.startTurn(context.session, 'hi');
    await context.orchestrator.waitForIdle('CA-1');

    expect(tts.calls).toEqual(['First.']);
    expect(context.session.history.lastTurn()?.content).toBe('First.');
  });

  it('drops the rest of the turn when the model fails', async () => {
    const llm = new FakeLLM(['One. ', 'Two. ']);
    llm.failAfter = 1;
    const tts = new FakeTTS();
    const { orchestrator, session } = setup(llm, tts);

    orchestrator.startTurn(session, 'hi');
    await orchestrator.waitForIdle('CA-1');

    expect(tts.calls).toEqual(['One.']);
    expect(session.history.lastTurn()?.content).toBe('One.');
    expect(orchestrator.isBusy('CA-1')).toBe(false);
  });

  it('apologizes on the stream when the model fails before any text', async () => {
    const llm = new FakeLLM(['Never said. ']);
    llm.failAfter = 0;
    const tts = new FakeTTS();
    const { orchestrator, connection, session } = setup(llm, tts);

    expect(orchestrator.startTurn(session, 'hi')).toBe('started');
    await orchestrator.waitForIdle('CA-1');

    expect(tts.calls).toEqual([APOLOGY]);
    expect(connection.marks()).toEqual([APOLOGY]);
    expect(session.history.length).toBe(1);
    expect(session.history.lastTurn()?.role).toBe('user');
  });

  it('records a sentence in the history even when its synthesis fails', async () => {
    const llm = new FakeLLM(['One. ', 'Two. ', 'Three.']);
    const tts = new FakeTTS();
    tts.failing.add('Two.');
    const { orchestrator, connection, session } = setup(llm, tts);

    orchestrator.startTurn(session, 'hi');
    await orchestrator.waitForIdle('CA-1');

    expect(tts.calls).toEqual(['One.', 'Two.', 'Three.']);
    expect(connection.marks()).toEqual(['One.', 'Three.']);
    expect(session.history.lastTurn()?.content).toBe('One. Two. Three.');
  });
});
