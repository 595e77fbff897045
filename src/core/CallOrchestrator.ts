/**
 * CallOrchestrator - Um turno de conversa: LLM em streaming → frases → áudio
 *
 * Responsável por:
 * - Garantir no máximo um turno em andamento por chamada
 * - Rodar o pipeline em background (o webhook responde na hora)
 * - Falar cada frase antes de puxar o próximo chunk do LLM
 * - Gravar as frases geradas no histórico e as latências do turno
 * - Pedir desculpas em voz quando o LLM falha antes do primeiro chunk
 * - Cancelar o turno quando a chamada termina
 */

import { CallSession, ILLM } from '../types';
import { CallConnectionRegistry } from './CallConnectionRegistry';
import { MetricsCollector } from './MetricsCollector';
import { SentenceSegmenter } from './SentenceSegmenter';
import { SpeechSynthesisPump } from './SpeechSynthesisPump';
import { Logger } from '../utils/Logger';

export type StartTurnResult = 'started' | 'no_connection' | 'busy';

export interface CallOrchestratorOptions {
  llm: ILLM;
  pump: SpeechSynthesisPump;
  registry: CallConnectionRegistry;
  metrics: MetricsCollector;
  systemPrompt: string;
  /** Falado quando o LLM falha antes de produzir qualquer texto */
  apology: string;
}

interface ActiveTurn {
  controller: AbortController;
  done: Promise<void>;
}

export class CallOrchestrator {
  private llm: ILLM;
  private pump: SpeechSynthesisPump;
  private registry: CallConnectionRegistry;
  private metrics: MetricsCollector;
  private systemPrompt: string;
  private apology: string;
  private turns: Map<string, ActiveTurn> = new Map();
  private logger: Logger;

  constructor(options: CallOrchestratorOptions) {
    this.llm = options.llm;
    this.pump = options.pump;
    this.registry = options.registry;
    this.metrics = options.metrics;
    this.systemPrompt = options.systemPrompt;
    this.apology = options.apology;
    this.logger = new Logger('Orchestrator');
  }

  /**
   * Dispara o turno sem aguardar. O chamador já gravou a fala do usuário
   * no histórico da sessão.
   */
  startTurn(session: CallSession, utterance: string): StartTurnResult {
    const callId = session.callId;

    if (!this.registry.lookup(callId)) {
      this.logger.warn(`📭 Call ${callId}: sem conexão de mídia, turno recusado`);
      return 'no_connection';
    }
    if (this.turns.has(callId)) {
      this.logger.debug(`⏳ Call ${callId}: turno já em andamento`);
      return 'busy';
    }

    const controller = new AbortController();
    const turn: ActiveTurn = { controller, done: Promise.resolve() };
    this.turns.set(callId, turn);

    turn.done = this.runTurn(session, utterance, controller.signal)
      .catch((error) => {
        this.logger.error(`❌ Turno da call ${callId} falhou:`, error);
      })
      .finally(() => {
        if (this.turns.get(callId) === turn) {
          this.turns.delete(callId);
        }
      });

    return 'started';
  }

  private async runTurn(session: CallSession, utterance: string, signal: AbortSignal): Promise<void> {
    const callId = session.callId;
    const turnId = this.metrics.startTurn(callId);
    const segmenter = new SentenceSegmenter();
    const produced: string[] = [];
    let receivedChunk = false;
    let stopped = false;

    this.logger.info(`🗣️ Call ${callId}: "${utterance.substring(0, 60)}"`);

    // false quando a entrega foi abandonada (sem conexão ou cancelado)
    const speak = async (sentence: string): Promise<boolean> => {
      produced.push(sentence);
      this.metrics.count(turnId, 'sentences');
      const result = await this.pump.speak(callId, sentence, signal, {
        onAudioReady: () => this.metrics.mark(turnId, 'first_audio'),
      });
      this.metrics.count(turnId, 'frames', result.delivered);
      return !result.abandoned;
    };

    try {
      const messages = session.history.toChatMessages(this.systemPrompt, utterance);

      for await (const chunk of this.llm.generateStream(messages, signal)) {
        if (signal.aborted) break;
        if (!receivedChunk) {
          this.metrics.mark(turnId, 'llm_first_token');
          receivedChunk = true;
        }

        for (const sentence of segmenter.feed(chunk)) {
          if (!(await speak(sentence)) || signal.aborted) {
            stopped = true;
            break;
          }
        }
        if (stopped) break;
      }

      if (!stopped && !signal.aborted) {
        const remainder = segmenter.flush();
        if (remainder) await speak(remainder);
      }
    } catch (error) {
      if (signal.aborted) {
        this.logger.debug(`Call ${callId}: stream do LLM cancelado`);
      } else {
        this.logger.error(`❌ Call ${callId}: erro no LLM, resto do turno descartado:`, error);
        if (!receivedChunk && this.apology) {
          await this.pump.speak(callId, this.apology, signal);
        }
      }
    } finally {
      const reply = produced.join(' ');
      if (reply) {
        session.history.addAssistant(reply);
        this.logger.info(`🤖 Call ${callId}: "${reply.substring(0, 60)}"`);
      }
      this.metrics.endTurn(turnId);
    }
  }

  /**
   * Aborta o turno em andamento; false se não havia nenhum
   */
  cancel(callId: string, reason = 'cancelled'): boolean {
    const turn = this.turns.get(callId);
    if (!turn) return false;
    if (!turn.controller.signal.aborted) {
      this.logger.info(`🛑 Call ${callId}: turno cancelado (${reason})`);
      turn.controller.abort(reason);
    }
    return true;
  }

  cancelAll(reason = 'shutdown'): void {
    for (const callId of this.turns.keys()) {
      this.cancel(callId, reason);
    }
  }

  isBusy(callId: string): boolean {
    return this.turns.has(callId);
  }

  /**
   * Resolve quando a chamada não tem turno em andamento
   */
  async waitForIdle(callId: string): Promise<void> {
    let turn = this.turns.get(callId);
    while (turn) {
      await turn.done;
      turn = this.turns.get(callId);
    }
  }

  async waitForAll(): Promise<void> {
    await Promise.all([...this.turns.keys()].map((callId) => this.waitForIdle(callId)));
  }
}
