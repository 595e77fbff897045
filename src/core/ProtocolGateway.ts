/**
 * ProtocolGateway - Ponte entre o protocolo do Twilio e a conversa
 *
 * Responsável por:
 * - Webhooks de controle (form → TwiML): chegada, resultado de fala, status
 * - Eventos do Media Stream (connected/start/media/mark/stop)
 * - Máquina de estados por chamada:
 *   NEW → GREETING_SENT → AWAITING_SPEECH → PROCESSING → AWAITING_SPEECH | ENDED
 * - Encerramento: frase de despedida, silêncio repetido, hangup, sweep
 *
 * O TwiML só controla a perna de telefonia; a resposta do agente sai pelo
 * Media Stream, de forma assíncrona, via CallOrchestrator.
 */

import { CallSession, IMediaConnection, TwilioWebhookParams } from '../types';
import { CallConnectionRegistry } from './CallConnectionRegistry';
import { CallOrchestrator } from './CallOrchestrator';
import { CallSessionStore } from './CallSessionStore';
import { MetricsCollector } from './MetricsCollector';
import { TwilioProvider, parseMediaMessage } from '../providers/TwilioProvider';
import { Logger } from '../utils/Logger';

const TERMINAL_CALL_STATUSES = new Set(['completed', 'busy', 'failed', 'no-answer', 'canceled']);

export interface GatewayPolicy {
  terminationPhrases: string[];
  maxEmptyResults: number;
  sessionIdleTimeoutMs: number;
}

export interface ProtocolGatewayOptions {
  sessions: CallSessionStore;
  orchestrator: CallOrchestrator;
  registry: CallConnectionRegistry;
  metrics: MetricsCollector;
  twilio: TwilioProvider;
  policy: GatewayPolicy;
  /** Chamado uma vez por chamada, depois que a sessão foi encerrada */
  onCallCompleted?: (session: CallSession) => void;
}

/**
 * A fala contém alguma frase de despedida (substring, sem diferenciar caixa)
 */
export function isTerminationPhrase(text: string, phrases: string[]): boolean {
  const normalized = text.toLowerCase();
  return phrases.some((phrase) => {
    const needle = phrase.trim().toLowerCase();
    return needle.length > 0 && normalized.includes(needle);
  });
}

export class ProtocolGateway {
  private sessions: CallSessionStore;
  private orchestrator: CallOrchestrator;
  private registry: CallConnectionRegistry;
  private metrics: MetricsCollector;
  private twilio: TwilioProvider;
  private policy: GatewayPolicy;
  private onCallCompleted?: (session: CallSession) => void;
  private logger: Logger;
  private mediaFrames: Map<string, number> = new Map();

  constructor(options: ProtocolGatewayOptions) {
    this.sessions = options.sessions;
    this.orchestrator = options.orchestrator;
    this.registry = options.registry;
    this.metrics = options.metrics;
    this.twilio = options.twilio;
    this.policy = options.policy;
    this.onCallCompleted = options.onCallCompleted;
    this.logger = new Logger('Gateway');
  }

  // ============================================
  // WEBHOOKS DE CONTROLE
  // ============================================

  /**
   * POST /webhook/voice - chegada da chamada
   */
  handleIncomingCall(params: TwilioWebhookParams, now: number = Date.now()): string {
    if (TERMINAL_CALL_STATUSES.has(params.callStatus)) {
      this.completeCall(params.callSid, `status ${params.callStatus}`);
      return this.twilio.emptyTwiml();
    }

    const session = this.session(params, now);

    switch (session.gatewayState) {
      case 'NEW': {
        session.gatewayState = 'GREETING_SENT';
        const twiml = this.twilio.greetingTwiml();
        session.gatewayState = 'AWAITING_SPEECH';
        this.logger.info(`📞 Call ${session.callId}: saudação enviada`);
        return twiml;
      }
      case 'ENDED':
        return this.twilio.hangupTwiml();
      default:
        return this.twilio.repromptTwiml();
    }
  }

  /**
   * POST /webhook/voice/speech - resultado do <Gather>
   */
  handleSpeechResult(params: TwilioWebhookParams, now: number = Date.now()): string {
    const session = this.session(params, now);
    if (session.gatewayState === 'ENDED') {
      return this.twilio.hangupTwiml();
    }

    const text = params.speechResult.trim();
    const callId = session.callId;

    if (!text) {
      // Silêncio enquanto o agente ainda fala não conta como falta de resposta
      if (this.orchestrator.isBusy(callId)) {
        return this.twilio.holdTwiml();
      }

      session.emptyResults++;
      this.logger.debug(`🔇 Call ${callId}: resultado vazio (${session.emptyResults}/${this.policy.maxEmptyResults})`);
      if (session.emptyResults >= this.policy.maxEmptyResults) {
        this.endCall(session, 'sem resposta');
        return this.twilio.noInputFarewellTwiml();
      }
      return this.twilio.emptyResultTwiml();
    }

    session.emptyResults = 0;
    this.logger.info(`🎤 Call ${callId}: "${text}"${params.confidence !== null ? ` (${params.confidence.toFixed(2)})` : ''}`);

    if (isTerminationPhrase(text, this.policy.terminationPhrases)) {
      session.history.addUser(text);
      this.endCall(session, 'despedida');
      return this.twilio.farewellTwiml();
    }

    if (this.orchestrator.isBusy(callId)) {
      this.logger.debug(`⏳ Call ${callId}: fala ignorada, agente ainda respondendo`);
      return this.twilio.holdTwiml();
    }

    session.gatewayState = 'PROCESSING';
    session.state = 'active';
    session.history.addUser(text);

    const result = this.orchestrator.startTurn(session, text);
    const twiml = result === 'started' ? this.twilio.holdTwiml() : this.twilio.apologyTwiml();
    session.gatewayState = 'AWAITING_SPEECH';
    return twiml;
  }

  /**
   * POST /webhook/status - status callback
   */
  handleStatusCallback(params: TwilioWebhookParams): void {
    this.logger.debug(`📟 Call ${params.callSid}: status ${params.callStatus}`);
    if (TERMINAL_CALL_STATUSES.has(params.callStatus)) {
      this.completeCall(params.callSid, `status ${params.callStatus}`);
    }
  }

  // ============================================
  // MEDIA STREAM
  // ============================================

  handleMediaMessage(connection: IMediaConnection, data: string | Buffer, now: number = Date.now()): void {
    const message = parseMediaMessage(data);
    if (!message) {
      this.logger.debug(`Mensagem inválida na conexão ${connection.id}; ignorada`);
      return;
    }

    switch (message.event) {
      case 'connected':
        this.logger.debug(`🔌 Conexão ${connection.id}: ${message.protocol} ${message.version}`);
        break;

      case 'start': {
        const { callSid, streamSid } = message.start;
        connection.bind(callSid, streamSid);
        this.registry.register(callSid, connection);
        this.sessions.touch(callSid, now);
        this.logger.info(`🎧 Media Stream ${streamSid} ligado à call ${callSid}`);
        break;
      }

      case 'media': {
        const callId = connection.callId;
        if (callId) {
          this.mediaFrames.set(callId, (this.mediaFrames.get(callId) ?? 0) + 1);
          this.sessions.touch(callId, now);
        }
        break;
      }

      case 'mark':
        this.logger.debug(`🔖 Conexão ${connection.id}: mark "${message.mark.name}" tocado`);
        break;

      case 'stop':
        this.logger.info(`⏹️ Media Stream da call ${connection.callId ?? '?'} parado`);
        this.handleTransportClosed(connection, 'stop');
        break;
    }
  }

  /**
   * stop, close ou erro do socket. Só encerra a chamada se a conexão ainda
   * era a registrada para ela.
   */
  handleTransportClosed(connection: IMediaConnection, reason = 'closed'): void {
    const callId = connection.callId;
    if (!callId) return;

    if (this.registry.remove(callId, connection)) {
      this.completeCall(callId, `transporte ${reason}`);
    }
  }

  /** Frames de áudio recebidos do chamador */
  inboundFrames(callId: string): number {
    return this.mediaFrames.get(callId) ?? 0;
  }

  // ============================================
  // ENCERRAMENTO
  // ============================================

  /**
   * Remove sessões sem atividade e pede ao Twilio que encerre a chamada
   */
  async sweepIdleSessions(now: number = Date.now()): Promise<string[]> {
    const idle = this.sessions.idle(now, this.policy.sessionIdleTimeoutMs);

    for (const session of idle) {
      const callId = session.callId;
      // Depois do <Hangup> o Twilio já está desligando a chamada
      const hungUp = session.gatewayState === 'ENDED';
      this.logger.warn(`🧹 Call ${callId}: inativa há ${Math.round((now - session.lastActivityAt) / 1000)}s`);

      const connection = this.registry.lookup(callId);
      if (connection) {
        this.registry.remove(callId, connection);
        connection.close(1000, 'idle');
      }
      this.completeCall(callId, 'inatividade', now);

      if (!hungUp) {
        try {
          await this.twilio.endCall(callId);
        } catch (error) {
          this.logger.error(`❌ Falha ao encerrar call ${callId} via API:`, error);
        }
      }
    }

    return idle.map((session) => session.callId);
  }

  get activeCalls(): number {
    return this.sessions.size;
  }

  private session(params: TwilioWebhookParams, now: number): CallSession {
    return this.sessions.getOrCreate({ callId: params.callSid, from: params.from, to: params.to }, now);
  }

  // A sessão fica viva até o status callback (ou stop do stream) confirmar o fim
  private endCall(session: CallSession, reason: string): void {
    session.gatewayState = 'ENDED';
    this.orchestrator.cancel(session.callId, reason);
    this.logger.info(`👋 Call ${session.callId}: encerrando (${reason})`);
  }

  private completeCall(callId: string, reason: string, now: number = Date.now()): void {
    this.orchestrator.cancel(callId, reason);
    this.mediaFrames.delete(callId);

    const session = this.sessions.complete(callId, now);
    if (!session) return;

    this.metrics.endCall(callId);
    this.onCallCompleted?.(session);
  }
}
