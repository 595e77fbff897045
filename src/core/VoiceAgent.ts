/**
 * VoiceAgent - Servidor HTTP + WebSocket do agente de voz
 *
 * Responsável por:
 * - Montar o pipeline (registry, sessões, pump, orquestrador, gateway)
 * - Rotear webhooks do Twilio (form-urlencoded → TwiML)
 * - Aceitar o Media Stream em /media-stream
 * - Validar X-Twilio-Signature (opcional)
 * - Varrer sessões inativas periodicamente
 * - Resumir a conversa ao desligar (opcional)
 */

import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import WebSocket from 'ws';
import { CallSession, ILLM, ITTS, TwilioWebhookParams } from '../types';
import { CallConnectionRegistry } from './CallConnectionRegistry';
import { CallOrchestrator } from './CallOrchestrator';
import { CallSessionStore } from './CallSessionStore';
import { MediaConnection } from './MediaConnection';
import { MetricsCollector } from './MetricsCollector';
import { GatewayPolicy, ProtocolGateway } from './ProtocolGateway';
import { SpeechSynthesisPump } from './SpeechSynthesisPump';
import { MEDIA_STREAM_PATH, SPEECH_WEBHOOK_PATH, TwilioProvider, parseWebhookParams } from '../providers/TwilioProvider';
import { Logger } from '../utils/Logger';

const SUMMARY_PROMPT =
  'Summarize this phone conversation in two sentences: what the caller wanted and how it was resolved.';

type WebhookRoute = 'incoming' | 'speech' | 'status';

const WEBHOOK_ROUTES: Record<string, WebhookRoute> = {
  '/webhook/voice': 'incoming',
  [SPEECH_WEBHOOK_PATH]: 'speech',
  '/webhook/status': 'status',
};

export interface VoiceAgentConfig {
  llm: ILLM;
  tts: ITTS;
  twilio: TwilioProvider;
  systemPrompt: string;
  /** Falado no stream de mídia quando o LLM nem chega a responder */
  apology: string;
  audio: {
    frameBytes: number;
    frameDurationMs: number;
    pacingLeadFrames: number;
  };
  policy: GatewayPolicy;
  /** URL pública, usada para conferir a assinatura dos webhooks */
  publicUrl: string;
  validateSignature: boolean;
  sweepIntervalMs: number;
  summarizeOnHangup: boolean;
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

export class VoiceAgent {
  readonly registry: CallConnectionRegistry;
  readonly sessions: CallSessionStore;
  readonly metrics: MetricsCollector;
  readonly orchestrator: CallOrchestrator;
  readonly gateway: ProtocolGateway;

  private config: VoiceAgentConfig;
  private logger: Logger;
  private server: Server | null = null;
  private wss: WebSocket.Server | null = null;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(config: VoiceAgentConfig) {
    this.config = config;
    this.logger = new Logger('VoiceAgent');

    this.registry = new CallConnectionRegistry();
    this.sessions = new CallSessionStore();
    this.metrics = new MetricsCollector();

    const pump = new SpeechSynthesisPump({
      tts: config.tts,
      registry: this.registry,
      ...config.audio,
    });

    this.orchestrator = new CallOrchestrator({
      llm: config.llm,
      pump,
      registry: this.registry,
      metrics: this.metrics,
      systemPrompt: config.systemPrompt,
      apology: config.apology,
    });

    this.gateway = new ProtocolGateway({
      sessions: this.sessions,
      orchestrator: this.orchestrator,
      registry: this.registry,
      metrics: this.metrics,
      twilio: config.twilio,
      policy: config.policy,
      onCallCompleted: (session) => this.handleCallCompleted(session),
    });
  }

  /**
   * Inicia o servidor HTTP para webhooks; devolve a porta efetiva
   */
  async start(port: number, host?: string): Promise<number> {
    const server = createServer((req, res) => this.handleRequest(req, res));

    // WebSocket server sem path (roteamos o upgrade manualmente)
    const wss = new WebSocket.Server({ noServer: true });
    wss.on('connection', (ws) => this.handleMediaStream(ws));

    server.on('upgrade', (request, socket, head) => {
      const pathname = new URL(request.url ?? '/', 'http://localhost').pathname;

      if (pathname === MEDIA_STREAM_PATH) {
        wss.handleUpgrade(request, socket, head, (ws) => {
          wss.emit('connection', ws, request);
        });
      } else {
        this.logger.warn(`🔌 WebSocket path não reconhecido: ${pathname}`);
        socket.destroy();
      }
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    this.server = server;
    this.wss = wss;

    if (this.config.sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => {
        this.gateway.sweepIdleSessions().catch((error) => {
          this.logger.error('Erro no sweep de sessões:', error);
        });
      }, this.config.sweepIntervalMs);
      this.sweepTimer.unref();
    }

    const address = server.address();
    const boundPort = typeof address === 'object' && address !== null ? address.port : port;
    this.logger.info(`🎧 Voice Agent listening on port ${boundPort}`);
    this.logger.info(`🔌 Media Stream ready at ws://localhost:${boundPort}${MEDIA_STREAM_PATH}`);
    return boundPort;
  }

  /**
   * Fecha sockets, cancela turnos e para o servidor
   */
  async stop(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }

    this.orchestrator.cancelAll('shutdown');

    const wss = this.wss;
    if (wss) {
      for (const client of wss.clients) {
        client.close(1001, 'shutdown');
      }
      await new Promise<void>((resolve) => wss.close(() => resolve()));
      this.wss = null;
    }

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeAllConnections();
      });
      this.server = null;
    }

    await this.orchestrator.waitForAll();
    this.logger.info('👋 Voice Agent parado');
  }

  // ============================================
  // HTTP
  // ============================================

  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;

    if (pathname === '/health') {
      if (req.method !== 'GET') {
        res.writeHead(405, { Allow: 'GET' });
        res.end();
        return;
      }
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({
        status: 'ok',
        activeCalls: this.gateway.activeCalls,
        connections: this.registry.size,
      }));
      return;
    }

    const route = WEBHOOK_ROUTES[pathname];
    if (!route) {
      res.writeHead(404);
      res.end();
      return;
    }

    if (req.method !== 'POST') {
      res.writeHead(405, { Allow: 'POST' });
      res.end();
      return;
    }

    let body = '';
    req.setEncoding('utf8');
    req.on('data', (chunk: string) => (body += chunk));
    req.on('end', () => {
      const params = parseWebhookParams(body);

      if (this.config.validateSignature) {
        const signature = req.headers['x-twilio-signature'];
        const url = `${this.config.publicUrl}${req.url ?? pathname}`;
        const valid = this.config.twilio.validateSignature(
          typeof signature === 'string' ? signature : undefined,
          url,
          params.raw
        );
        if (!valid) {
          this.logger.warn(`🚫 Assinatura inválida em ${pathname}`);
          res.writeHead(403);
          res.end();
          return;
        }
      }

      this.logger.debug(`📡 Twilio webhook recebido: ${pathname} (${params.callSid})`);

      let twiml: string;
      try {
        twiml = this.dispatch(route, params);
      } catch (error) {
        this.logger.error(`Erro ao processar webhook ${pathname}:`, error);
        twiml = this.config.twilio.apologyTwiml();
      }

      res.writeHead(200, { 'Content-Type': 'text/xml' });
      res.end(twiml);
    });
  }

  private dispatch(route: WebhookRoute, params: TwilioWebhookParams): string {
    switch (route) {
      case 'incoming':
        return this.gateway.handleIncomingCall(params);
      case 'speech':
        return this.gateway.handleSpeechResult(params);
      case 'status':
        this.gateway.handleStatusCallback(params);
        return this.config.twilio.emptyTwiml();
    }
  }

  // ============================================
  // MEDIA STREAM
  // ============================================

  private handleMediaStream(ws: WebSocket): void {
    const connection = new MediaConnection(ws);
    this.logger.info(`🔌 Twilio Media Stream conectado (${connection.id})`);

    ws.on('message', (data: WebSocket.RawData) => {
      try {
        this.gateway.handleMediaMessage(connection, toBuffer(data));
      } catch (error) {
        this.logger.error(`Erro processando mensagem da conexão ${connection.id}:`, error);
      }
    });

    ws.on('close', () => {
      this.logger.info(`🔌 Media Stream ${connection.id} desconectado`);
      this.gateway.handleTransportClosed(connection, 'close');
    });

    ws.on('error', (error) => {
      this.logger.error(`Erro WebSocket na conexão ${connection.id}:`, error);
      this.gateway.handleTransportClosed(connection, 'error');
    });
  }

  // ============================================
  // FIM DA CHAMADA
  // ============================================

  private handleCallCompleted(session: CallSession): void {
    if (!this.config.summarizeOnHangup || session.history.length === 0) return;

    this.summarizeCall(session)
      .then((summary) => {
        if (summary) this.logger.info(`📝 Resumo da call ${session.callId}: ${summary}`);
      })
      .catch((error) => {
        this.logger.error(`Erro ao resumir call ${session.callId}:`, error);
      });
  }

  /**
   * Resume a transcrição da chamada com o LLM
   */
  async summarizeCall(session: CallSession): Promise<string | null> {
    const transcript = session.history.toTranscript();
    if (!transcript) return null;

    const response = await this.config.llm.generate([
      { role: 'system', content: SUMMARY_PROMPT },
      { role: 'user', content: transcript },
    ]);
    const summary = response.text.trim();
    return summary || null;
  }
}
