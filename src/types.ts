/**
 * Type definitions for the phone voice agent
 */

import type { TranscriptAssembler } from './core/TranscriptAssembler';

// ============================================
// CALL TYPES
// ============================================

/** Ciclo de vida da sessão (visão do negócio) */
export type CallLifecycleState = 'awaiting_first_input' | 'active' | 'completed';

/** Máquina de estados do protocolo (visão do carrier) */
export type GatewayState =
  | 'NEW'
  | 'GREETING_SENT'
  | 'AWAITING_SPEECH'
  | 'PROCESSING'
  | 'ENDED';

export interface CallSession {
  callId: string;
  from: string;
  to: string;
  state: CallLifecycleState;
  gatewayState: GatewayState;
  history: TranscriptAssembler;
  /** Resultados de fala vazios consecutivos */
  emptyResults: number;
  createdAt: Date;
  endedAt?: Date;
  lastActivityAt: number;
}

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
  timestamp: Date;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

// ============================================
// TWILIO TYPES
// ============================================

export interface TwilioConfig {
  accountSid: string;
  authToken: string;
  /** URL pública do servidor, sem barra final */
  publicUrl: string;
}

export interface TwimlPrompts {
  greeting: string;
  farewell: string;
  apology: string;
  emptyApology: string;
  noInputFarewell: string;
  reprompt: string;
  sayVoice: string;
  sayLanguage: string;
  holdPauseSeconds: number;
  gatherTimeoutSeconds: number;
}

/** Campos do webhook de voz (form-urlencoded) */
export interface TwilioWebhookParams {
  callSid: string;
  accountSid: string;
  from: string;
  to: string;
  callStatus: string;
  direction: string;
  speechResult: string;
  confidence: number | null;
  raw: Record<string, string>;
}

export interface TwilioMediaFormat {
  encoding: string;
  sampleRate: number;
  channels: number;
}

// Mensagens do Media Stream - https://www.twilio.com/docs/voice/media-streams/websocket-messages
export interface TwilioConnectedMessage {
  event: 'connected';
  protocol: string;
  version: string;
}

export interface TwilioStartMessage {
  event: 'start';
  sequenceNumber: string;
  streamSid: string;
  start: {
    streamSid: string;
    accountSid: string;
    callSid: string;
    tracks: string[];
    mediaFormat: TwilioMediaFormat | null;
    customParameters: Record<string, string>;
  };
}

export interface TwilioMediaPayloadMessage {
  event: 'media';
  sequenceNumber: string;
  streamSid: string;
  media: {
    track: string;
    chunk: string;
    timestamp: string;
    payload: string; // Base64 encoded audio
  };
}

export interface TwilioMarkMessage {
  event: 'mark';
  sequenceNumber: string;
  streamSid: string;
  mark: {
    name: string;
  };
}

export interface TwilioStopMessage {
  event: 'stop';
  sequenceNumber: string;
  streamSid: string;
  stop: {
    accountSid: string;
    callSid: string;
  };
}

export type TwilioMediaMessage =
  | TwilioConnectedMessage
  | TwilioStartMessage
  | TwilioMediaPayloadMessage
  | TwilioMarkMessage
  | TwilioStopMessage;

// ============================================
// PROVIDER TYPES
// ============================================

export interface OpenAIConfig {
  apiKey: string;
  baseUrl?: string;
  llmModel: string;
  maxTokens: number;
  temperature: number;
}

export interface LLMResponse {
  text: string;
  finishReason: 'stop' | 'length' | 'tool_calls' | 'content_filter' | 'function_call';
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

export interface ElevenLabsConfig {
  apiKey: string;
  voiceId: string;
  model: string;
  stability: number;
  similarityBoost: number;
  style: number;
}

export interface TTSResult {
  audioBuffer: Buffer;
  /** Duração do áudio em segundos */
  duration: number;
  characterCount: number;
}

// ============================================
// METRICS TYPES
// ============================================

export type TurnStage = 'llm_first_token' | 'first_audio';

export interface TurnMetrics {
  turnId: string;
  callId: string;
  llmFirstTokenMs: number | null;
  firstAudioMs: number | null;
  totalMs: number;
  sentences: number;
  frames: number;
}

export interface CallMetrics {
  callId: string;
  turns: number;
  averageFirstAudioMs: number | null;
  averageTotalMs: number | null;
  totalFrames: number;
}

// ============================================
// PROVIDER INTERFACES
// ============================================

export interface ILLM {
  generate(
    messages: ChatMessage[],
    options?: { maxTokens?: number; temperature?: number }
  ): Promise<LLMResponse>;
  generateStream(messages: ChatMessage[], signal?: AbortSignal): AsyncIterable<string>;
}

export interface ITTS {
  synthesize(text: string, signal?: AbortSignal): Promise<TTSResult>;
}

/**
 * Conexão de Media Stream endereçável por callId depois do evento "start"
 */
export interface IMediaConnection {
  readonly id: string;
  readonly callId: string | null;
  readonly streamSid: string | null;
  bind(callId: string, streamSid: string): void;
  isOpen(): boolean;
  sendMedia(payload: Buffer): Promise<void>;
  sendMark(name: string): Promise<void>;
  /** Garante um único escritor por vez na conexão */
  withWriteLock<T>(section: () => Promise<T>): Promise<T>;
  close(code?: number, reason?: string): void;
}
