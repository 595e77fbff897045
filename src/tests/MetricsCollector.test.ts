import { describe, it, expect } from 'vitest';
import { MetricsCollector } from '../core/MetricsCollector';

const THRESHOLDS = { llmFirstToken: 800, firstAudio: 1500, total: 8000 };

function clocked() {
  let now = 0;
  const metrics = new MetricsCollector(THRESHOLDS, () => now);
  return {
    metrics,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe('MetricsCollector', () => {
  it('measures stage latencies relative to the turn start', () => {
    const { metrics, advance } = clocked();
    const turnId = metrics.startTurn('CA-1');

    advance(300);
    metrics.mark(turnId, 'llm_first_token');
    advance(200);
    metrics.mark(turnId, 'first_audio');
    advance(100);
    metrics.mark(turnId, 'first_audio');
    metrics.count(turnId, 'sentences', 2);
    metrics.count(turnId, 'frames', 40);
    advance(400);

    expect(metrics.endTurn(turnId)).toEqual({
      turnId,
      callId: 'CA-1',
      llmFirstTokenMs: 300,
      firstAudioMs: 500,
      totalMs: 1000,
      sentences: 2,
      frames: 40,
    });
    expect(metrics.endTurn(turnId)).toBeNull();
  });

  it('aggregates turns per call', () => {
    const { metrics, advance } = clocked();

    const first = metrics.startTurn('CA-1');
    advance(100);
    metrics.mark(first, 'first_audio');
    metrics.count(first, 'frames', 10);
    advance(100);
    metrics.endTurn(first);

    const second = metrics.startTurn('CA-1');
    advance(400);
    metrics.count(second, 'frames', 5);
    metrics.endTurn(second);

    expect(metrics.getCallMetrics('CA-1')).toEqual({
      callId: 'CA-1',
      turns: 2,
      averageFirstAudioMs: 100,
      averageTotalMs: 300,
      totalFrames: 15,
    });
  });

  it('closes open turns and forgets the call on endCall', () => {
    const { metrics } = clocked();
    const turnId = metrics.startTurn('CA-1');
    metrics.count(turnId, 'frames', 3);

    expect(metrics.endCall('CA-1')?.totalFrames).toBe(3);
    expect(metrics.endCall('CA-1')).toBeNull();
    expect(metrics.getCallMetrics('CA-1').turns).toBe(0);
  });
});
