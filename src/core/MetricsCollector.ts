/**
 * MetricsCollector - Coletor de métricas de latência
 *
 * Responsável por:
 * - Rastrear o tempo de cada turno (fala do usuário → áudio na linha)
 * - Contar frases e frames entregues
 * - Calcular métricas agregadas por chamada
 * - Alertar quando latências excedem thresholds
 */

import { v4 as uuidv4 } from 'uuid';
import { CallMetrics, TurnMetrics, TurnStage } from '../types';
import { config } from '../config';
import { Logger } from '../utils/Logger';

export interface LatencyThresholds {
  llmFirstToken: number;
  firstAudio: number;
  total: number;
}

interface TurnData {
  turnId: string;
  callId: string;
  startTime: number;
  stages: Partial<Record<TurnStage, number>>;
  sentences: number;
  frames: number;
}

interface CallData {
  callId: string;
  completed: TurnMetrics[];
  startTime: number;
}

export class MetricsCollector {
  private logger: Logger;
  private calls: Map<string, CallData> = new Map();
  private turns: Map<string, TurnData> = new Map();
  private thresholds: LatencyThresholds;
  private now: () => number;

  constructor(
    thresholds: LatencyThresholds = config.metrics.alertThresholds,
    now: () => number = Date.now
  ) {
    this.logger = new Logger('Metrics');
    this.thresholds = thresholds;
    this.now = now;
  }

  /**
   * Inicia o tracking de um novo turno de conversa
   */
  startTurn(callId: string): string {
    const turnId = uuidv4().substring(0, 8);
    const now = this.now();

    if (!this.calls.has(callId)) {
      this.calls.set(callId, { callId, completed: [], startTime: now });
    }

    this.turns.set(turnId, {
      turnId,
      callId,
      startTime: now,
      stages: {},
      sentences: 0,
      frames: 0,
    });

    this.logger.debug(`📊 Turn ${turnId} started for call ${callId}`);
    return turnId;
  }

  /**
   * Registra o primeiro instante de uma etapa (chamadas repetidas são ignoradas)
   */
  mark(turnId: string, stage: TurnStage): void {
    const turn = this.turns.get(turnId);
    if (!turn) {
      this.logger.debug(`Turn ${turnId} not found for event ${stage}`);
      return;
    }
    if (turn.stages[stage] === undefined) {
      turn.stages[stage] = this.now() - turn.startTime;
    }
  }

  count(turnId: string, field: 'sentences' | 'frames', amount = 1): void {
    const turn = this.turns.get(turnId);
    if (turn) turn[field] += amount;
  }

  /**
   * Finaliza um turno e calcula as métricas
   */
  endTurn(turnId: string): TurnMetrics | null {
    const turn = this.turns.get(turnId);
    if (!turn) return null;
    this.turns.delete(turnId);

    const metrics: TurnMetrics = {
      turnId,
      callId: turn.callId,
      llmFirstTokenMs: turn.stages.llm_first_token ?? null,
      firstAudioMs: turn.stages.first_audio ?? null,
      totalMs: this.now() - turn.startTime,
      sentences: turn.sentences,
      frames: turn.frames,
    };

    this.checkThresholds(metrics);
    this.calls.get(turn.callId)?.completed.push(metrics);
    return metrics;
  }

  /**
   * Verifica se latências excedem thresholds e emite alertas
   */
  private checkThresholds(metrics: TurnMetrics): void {
    const alerts: string[] = [];

    if (metrics.llmFirstTokenMs !== null && metrics.llmFirstTokenMs > this.thresholds.llmFirstToken) {
      alerts.push(`LLM first token ${metrics.llmFirstTokenMs}ms > ${this.thresholds.llmFirstToken}ms`);
    }
    if (metrics.firstAudioMs !== null && metrics.firstAudioMs > this.thresholds.firstAudio) {
      alerts.push(`First audio ${metrics.firstAudioMs}ms > ${this.thresholds.firstAudio}ms`);
    }
    if (metrics.totalMs > this.thresholds.total) {
      alerts.push(`Total ${metrics.totalMs}ms > ${this.thresholds.total}ms`);
    }

    if (metrics.firstAudioMs !== null) {
      this.logger.latency(`Turn ${metrics.turnId} first audio`, metrics.firstAudioMs, this.thresholds.firstAudio);
    }
    this.logger.latency(`Turn ${metrics.turnId} total`, metrics.totalMs, this.thresholds.total);

    if (alerts.length > 0) {
      this.logger.warn(`⚠️ Turn ${metrics.turnId} latency alerts: ${alerts.join(', ')}`);
    }
  }

  /**
   * Retorna métricas agregadas de uma chamada
   */
  getCallMetrics(callId: string): CallMetrics {
    const turns = this.calls.get(callId)?.completed ?? [];
    const withAudio = turns
      .map((turn) => turn.firstAudioMs)
      .filter((value): value is number => value !== null);

    return {
      callId,
      turns: turns.length,
      averageFirstAudioMs: average(withAudio),
      averageTotalMs: average(turns.map((turn) => turn.totalMs)),
      totalFrames: turns.reduce((sum, turn) => sum + turn.frames, 0),
    };
  }

  /**
   * Finaliza a chamada: loga o resumo e libera a memória
   */
  endCall(callId: string): CallMetrics | null {
    if (!this.calls.has(callId)) return null;

    for (const [turnId, turn] of this.turns) {
      if (turn.callId === callId) this.endTurn(turnId);
    }

    const summary = this.getCallMetrics(callId);
    this.calls.delete(callId);

    this.logger.info(
      `📊 Call ${callId}: ${summary.turns} turnos, ` +
        `first audio médio ${summary.averageFirstAudioMs ?? '-'}ms, ` +
        `${summary.totalFrames} frames`
    );
    return summary;
  }
}

function average(values: number[]): number | null {
  if (values.length === 0) return null;
  return Math.round(values.reduce((sum, value) => sum + value, 0) / values.length);
}
