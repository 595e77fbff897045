/**
 * Configuração centralizada do sistema
 *
 * Tudo vem de variáveis de ambiente (.env via dotenv) com defaults seguros.
 * Credenciais ausentes só são verificadas em validateConfig(), chamada
 * uma única vez no startup (src/index.ts).
 */

import dotenv from 'dotenv';
dotenv.config();

// ============================================================================
// HELPERS DE PARSE
// ============================================================================

/**
 * Lê um inteiro do ambiente; valor ausente ou inválido cai no default
 */
export function parseInteger(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const parsed = Number(value.trim());
  return Number.isInteger(parsed) ? parsed : defaultValue;
}

export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1' || normalized === 'yes') return true;
  if (normalized === 'false' || normalized === '0' || normalized === 'no') return false;
  return defaultValue;
}

/**
 * Lista separada por vírgula, sem itens vazios
 */
export function parseList(value: string | undefined, defaultValue: string[]): string[] {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

// ============================================================================
// PROMPTS E FRASES DO AGENTE
// ============================================================================

const DEFAULT_SYSTEM_PROMPT = `You are a helpful AI voice assistant answering a phone call.
Respond naturally and conversationally.
Keep answers short: at most three sentences, each one easy to say out loud.
Never use lists, markdown, emojis or URLs - everything you write will be spoken.`;

// Frases que encerram a ligação (substring, case-insensitive)
const DEFAULT_TERMINATION_PHRASES = [
  'hang up',
  'goodbye',
  'bye',
  'have a great day',
  'take care',
  'talk to you later',
];

// ============================================================================
// CONFIGURAÇÃO PRINCIPAL
// ============================================================================

const env = process.env;

export const config = {
  // Servidor HTTP + WebSocket
  server: {
    port: parseInteger(env.PORT, 3000),
    host: env.HOST || '0.0.0.0',
    // URL pública (ngrok, load balancer...) usada no TwiML e na validação de assinatura
    publicUrl: (env.PUBLIC_URL || '').replace(/\/+$/, ''),
  },

  // Twilio - Telefonia
  twilio: {
    accountSid: env.TWILIO_ACCOUNT_SID || '',
    authToken: env.TWILIO_AUTH_TOKEN || '',
    validateSignature: parseBoolean(env.TWILIO_VALIDATE_SIGNATURE, false),
  },

  // OpenAI - LLM (streaming)
  openai: {
    apiKey: env.OPENAI_API_KEY || '',
    baseUrl: env.OPENAI_BASE_URL || undefined,
    llmModel: env.OPENAI_LLM_MODEL || 'gpt-4o-mini',
    maxTokens: parseInteger(env.OPENAI_MAX_TOKENS, 256),
    temperature: parseNumber(env.OPENAI_TEMPERATURE, 0.7),
  },

  // ElevenLabs - TTS (saída μ-law 8kHz, formato nativo do Media Stream)
  elevenlabs: {
    apiKey: env.ELEVENLABS_API_KEY || '',
    voiceId: env.ELEVENLABS_VOICE_ID || '',
    model: env.ELEVENLABS_MODEL || 'eleven_flash_v2_5',
    stability: parseNumber(env.ELEVENLABS_STABILITY, 0.5),
    similarityBoost: parseNumber(env.ELEVENLABS_SIMILARITY_BOOST, 0.75),
    style: parseNumber(env.ELEVENLABS_STYLE, 0),
  },

  // Agente - comportamento da conversa
  agent: {
    systemPrompt: env.AGENT_SYSTEM_PROMPT || DEFAULT_SYSTEM_PROMPT,
    greeting: env.AGENT_GREETING || 'Hello! How can I help you today?',
    farewell: env.AGENT_FAREWELL || 'Okay, goodbye!',
    apology: env.AGENT_APOLOGY || "Sorry, I'm having trouble answering right now. Could you say that again?",
    emptyApology: env.AGENT_EMPTY_APOLOGY || "Sorry, I didn't catch that.",
    noInputFarewell: env.AGENT_NO_INPUT_FAREWELL || "I didn't hear anything, so I'll hang up now. Goodbye.",
    reprompt: env.AGENT_REPROMPT ?? '',
    sayVoice: env.AGENT_SAY_VOICE || 'Polly.Joanna',
    sayLanguage: env.AGENT_SAY_LANGUAGE || 'en-US',
    holdPauseSeconds: parseInteger(env.AGENT_HOLD_PAUSE_SECONDS, 1),
    gatherTimeoutSeconds: parseInteger(env.AGENT_GATHER_TIMEOUT_SECONDS, 5),
    terminationPhrases: parseList(env.AGENT_TERMINATION_PHRASES, DEFAULT_TERMINATION_PHRASES),
    // Resultados vazios consecutivos antes de desligar
    maxEmptyResults: parseInteger(env.AGENT_MAX_EMPTY_RESULTS, 2),
    sessionIdleTimeoutMs: parseInteger(env.AGENT_SESSION_IDLE_TIMEOUT_MS, 15 * 60 * 1000),
    sweepIntervalMs: parseInteger(env.AGENT_SWEEP_INTERVAL_MS, 60 * 1000),
    summarizeOnHangup: parseBoolean(env.AGENT_SUMMARY_ON_HANGUP, false),
  },

  // Áudio de saída: 160 bytes = 20ms de μ-law 8kHz
  audio: {
    frameBytes: parseInteger(env.AUDIO_FRAME_BYTES, 160),
    frameDurationMs: parseInteger(env.AUDIO_FRAME_DURATION_MS, 20),
    // Frames enviados em rajada antes do pacing começar (~200ms de folga no buffer do carrier)
    pacingLeadFrames: parseInteger(env.AUDIO_PACING_LEAD_FRAMES, 10),
  },

  // Métricas
  metrics: {
    alertThresholds: {
      llmFirstToken: 800,
      firstAudio: 1500,
      total: 8000,
    },
  },

  // Debug
  debug: {
    logLevel: env.LOG_LEVEL || 'info',
  },
};

export type AppConfig = typeof config;

// Validação - falha só no startup, nunca por chamada
export function validateConfig(target: AppConfig = config): void {
  const required: Record<string, string> = {
    OPENAI_API_KEY: target.openai.apiKey,
    ELEVENLABS_API_KEY: target.elevenlabs.apiKey,
    ELEVENLABS_VOICE_ID: target.elevenlabs.voiceId,
    TWILIO_ACCOUNT_SID: target.twilio.accountSid,
    TWILIO_AUTH_TOKEN: target.twilio.authToken,
    PUBLIC_URL: target.server.publicUrl,
  };

  const missing = Object.entries(required)
    .filter(([, value]) => !value)
    .map(([key]) => key);
  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }

  if (target.audio.frameBytes <= 0) {
    throw new Error('AUDIO_FRAME_BYTES must be a positive integer');
  }
  if (target.audio.frameDurationMs < 0 || target.audio.pacingLeadFrames < 0) {
    throw new Error('AUDIO_FRAME_DURATION_MS and AUDIO_PACING_LEAD_FRAMES must not be negative');
  }
  if (target.agent.maxEmptyResults < 1) {
    throw new Error('AGENT_MAX_EMPTY_RESULTS must be at least 1');
  }
}
