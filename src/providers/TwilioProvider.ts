/**
 * TwilioProvider - Provider de telefonia Twilio
 *
 * Responsável por:
 * - Gerar o TwiML de controle (saudação, espera, re-prompt, despedida)
 * - Validar e tipar webhooks (form-urlencoded) e mensagens do Media Stream
 * - Montar os envelopes de saída do Media Stream (media/mark)
 * - Encerrar chamadas via API REST
 *
 * Documentação:
 * - TwiML: https://www.twilio.com/docs/voice/twiml
 * - Media Streams: https://www.twilio.com/docs/voice/media-streams
 */

import twilio from 'twilio';
import {
  TwilioConfig,
  TwilioMediaFormat,
  TwilioMediaMessage,
  TwilioWebhookParams,
  TwimlPrompts,
} from '../types';
import { Logger } from '../utils/Logger';

export const SPEECH_WEBHOOK_PATH = '/webhook/voice/speech';
export const MEDIA_STREAM_PATH = '/media-stream';

// ============================================
// PARSE - webhooks e Media Stream
// ============================================

/**
 * Converte o corpo form-urlencoded do webhook em campos tipados
 */
export function parseWebhookParams(body: string): TwilioWebhookParams {
  const raw: Record<string, string> = {};
  new URLSearchParams(body).forEach((value, key) => {
    raw[key] = value;
  });

  const confidence = raw.Confidence !== undefined ? Number(raw.Confidence) : NaN;

  return {
    callSid: raw.CallSid ?? '',
    accountSid: raw.AccountSid ?? '',
    from: raw.From ?? '',
    to: raw.To ?? '',
    callStatus: raw.CallStatus ?? '',
    direction: raw.Direction ?? '',
    speechResult: raw.SpeechResult ?? '',
    confidence: Number.isFinite(confidence) ? confidence : null,
    raw,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: string): string | null {
  const value = source[key];
  return typeof value === 'string' ? value : null;
}

function readStringRecord(value: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (!isRecord(value)) return result;
  for (const [key, item] of Object.entries(value)) {
    if (typeof item === 'string') result[key] = item;
  }
  return result;
}

function readMediaFormat(value: unknown): TwilioMediaFormat | null {
  if (!isRecord(value)) return null;
  const { encoding, sampleRate, channels } = value;
  if (typeof encoding !== 'string' || typeof sampleRate !== 'number' || typeof channels !== 'number') {
    return null;
  }
  return { encoding, sampleRate, channels };
}

/**
 * Valida uma mensagem do Media Stream; null para JSON inválido,
 * evento desconhecido ou campos obrigatórios ausentes
 */
export function parseMediaMessage(data: string | Buffer): TwilioMediaMessage | null {
  let message: unknown;
  try {
    message = JSON.parse(typeof data === 'string' ? data : data.toString('utf8'));
  } catch {
    return null;
  }
  if (!isRecord(message)) return null;

  const sequenceNumber = readString(message, 'sequenceNumber') ?? '';

  switch (message.event) {
    case 'connected':
      return {
        event: 'connected',
        protocol: readString(message, 'protocol') ?? '',
        version: readString(message, 'version') ?? '',
      };

    case 'start': {
      const start = message.start;
      if (!isRecord(start)) return null;
      const callSid = readString(start, 'callSid');
      const streamSid = readString(start, 'streamSid') ?? readString(message, 'streamSid');
      if (!callSid || !streamSid) return null;
      return {
        event: 'start',
        sequenceNumber,
        streamSid,
        start: {
          streamSid,
          callSid,
          accountSid: readString(start, 'accountSid') ?? '',
          tracks: Array.isArray(start.tracks)
            ? start.tracks.filter((track): track is string => typeof track === 'string')
            : [],
          mediaFormat: readMediaFormat(start.mediaFormat),
          customParameters: readStringRecord(start.customParameters),
        },
      };
    }

    case 'media': {
      const media = message.media;
      if (!isRecord(media)) return null;
      const payload = readString(media, 'payload');
      if (payload === null) return null;
      return {
        event: 'media',
        sequenceNumber,
        streamSid: readString(message, 'streamSid') ?? '',
        media: {
          track: readString(media, 'track') ?? 'inbound',
          chunk: readString(media, 'chunk') ?? '',
          timestamp: readString(media, 'timestamp') ?? '',
          payload,
        },
      };
    }

    case 'mark': {
      const mark = message.mark;
      if (!isRecord(mark)) return null;
      const name = readString(mark, 'name');
      if (name === null) return null;
      return {
        event: 'mark',
        sequenceNumber,
        streamSid: readString(message, 'streamSid') ?? '',
        mark: { name },
      };
    }

    case 'stop': {
      const stop = isRecord(message.stop) ? message.stop : {};
      return {
        event: 'stop',
        sequenceNumber,
        streamSid: readString(message, 'streamSid') ?? '',
        stop: {
          accountSid: readString(stop, 'accountSid') ?? '',
          callSid: readString(stop, 'callSid') ?? '',
        },
      };
    }

    default:
      return null;
  }
}

// ============================================
// ENVELOPES DE SAÍDA DO MEDIA STREAM
// ============================================

export function buildMediaMessage(streamSid: string, audio: Buffer): string {
  return JSON.stringify({
    event: 'media',
    streamSid,
    media: {
      payload: audio.toString('base64'),
    },
  });
}

export function buildMarkMessage(streamSid: string, name: string): string {
  return JSON.stringify({
    event: 'mark',
    streamSid,
    mark: { name },
  });
}

// ============================================
// TWIML
// ============================================

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export class TwilioProvider {
  private config: TwilioConfig;
  private prompts: TwimlPrompts;
  private logger: Logger;
  private baseUrl = 'https://api.twilio.com/2010-04-01';

  constructor(config: TwilioConfig, prompts: TwimlPrompts) {
    this.config = config;
    this.prompts = prompts;
    this.logger = new Logger('Twilio');
  }

  get speechActionUrl(): string {
    return `${this.config.publicUrl}${SPEECH_WEBHOOK_PATH}`;
  }

  get streamUrl(): string {
    return `${this.config.publicUrl.replace(/^http/, 'ws')}${MEDIA_STREAM_PATH}`;
  }

  /**
   * Saudação: abre o Media Stream, fala a saudação e começa a ouvir
   */
  greetingTwiml(): string {
    return this.document([
      `<Start><Stream url="${escapeXml(this.streamUrl)}" /></Start>`,
      this.gather(this.prompts.greeting),
      this.redirect(),
    ]);
  }

  /**
   * Espera enquanto o pipeline assíncrono responde pelo Media Stream.
   * Mantém a perna de telefonia viva e já volta a ouvir.
   */
  holdTwiml(): string {
    return this.document([
      `<Pause length="${this.prompts.holdPauseSeconds}" />`,
      this.gather(this.prompts.reprompt),
      this.redirect(),
    ]);
  }

  /** Re-prompt sem saudação (webhook inicial repetido) */
  repromptTwiml(): string {
    return this.document([this.gather(this.prompts.reprompt), this.redirect()]);
  }

  /** Falha do pipeline: pede desculpas e continua ouvindo */
  apologyTwiml(): string {
    return this.document([
      this.say(this.prompts.apology),
      this.gather(this.prompts.reprompt),
      this.redirect(),
    ]);
  }

  /** Nada foi entendido */
  emptyResultTwiml(): string {
    return this.document([
      this.say(this.prompts.emptyApology),
      this.gather(this.prompts.reprompt),
      this.redirect(),
    ]);
  }

  farewellTwiml(text: string = this.prompts.farewell): string {
    return this.document([this.say(text), '<Hangup />']);
  }

  noInputFarewellTwiml(): string {
    return this.farewellTwiml(this.prompts.noInputFarewell);
  }

  hangupTwiml(): string {
    return this.document(['<Hangup />']);
  }

  emptyTwiml(): string {
    return this.document([]);
  }

  private say(text: string): string {
    return `<Say voice="${escapeXml(this.prompts.sayVoice)}" language="${escapeXml(this.prompts.sayLanguage)}">${escapeXml(text)}</Say>`;
  }

  private gather(prompt: string): string {
    const attributes = [
      'input="speech"',
      `action="${escapeXml(this.speechActionUrl)}"`,
      'method="POST"',
      'speechTimeout="auto"',
      `timeout="${this.prompts.gatherTimeoutSeconds}"`,
      `language="${escapeXml(this.prompts.sayLanguage)}"`,
    ].join(' ');

    return prompt.trim()
      ? `<Gather ${attributes}>${this.say(prompt)}</Gather>`
      : `<Gather ${attributes} />`;
  }

  // Sem fala no Gather, o Twilio segue para o próximo verbo: volta ao webhook de fala
  private redirect(): string {
    return `<Redirect method="POST">${escapeXml(this.speechActionUrl)}</Redirect>`;
  }

  private document(verbs: string[]): string {
    const body = verbs.map((verb) => `  ${verb}\n`).join('');
    return `<?xml version="1.0" encoding="UTF-8"?>\n<Response>\n${body}</Response>`;
  }

  // ============================================
  // SEGURANÇA
  // ============================================

  /**
   * Confere o header X-Twilio-Signature
   * https://www.twilio.com/docs/usage/webhooks/webhooks-security
   */
  validateSignature(signature: string | undefined, url: string, params: Record<string, string>): boolean {
    if (!signature) return false;
    return twilio.validateRequest(this.config.authToken, signature, url, params);
  }

  // ============================================
  // API REST
  // ============================================

  /**
   * Gera header de autenticação Basic Auth
   */
  private getAuthHeader(): string {
    const credentials = Buffer.from(`${this.config.accountSid}:${this.config.authToken}`).toString('base64');
    return `Basic ${credentials}`;
  }

  /**
   * Faz requisição para API Twilio
   */
  private async apiRequest(
    method: string,
    endpoint: string,
    body?: Record<string, string>
  ): Promise<unknown> {
    const url = `${this.baseUrl}/Accounts/${this.config.accountSid}${endpoint}`;

    const options: RequestInit = {
      method,
      headers: {
        'Authorization': this.getAuthHeader(),
        'Content-Type': 'application/x-www-form-urlencoded',
      },
    };

    if (body) {
      options.body = new URLSearchParams(body).toString();
    }

    const response = await fetch(url, options);

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`Twilio API error: ${response.status} - ${error}`);
    }

    return response.json();
  }

  /**
   * Encerra uma chamada em andamento
   *
   * Documentação: https://www.twilio.com/docs/voice/tutorials/how-to-modify-calls-in-progress
   */
  async endCall(callSid: string): Promise<void> {
    this.logger.info(`📴 Encerrando chamada ${callSid} via API`);
    // https://www.twilio.com/docs/voice/api/call-resource
    const response = await this.apiRequest('POST', `/Calls/${callSid}.json`, {
      Status: 'completed',
    });
    const status = isRecord(response) ? readString(response, 'status') : null;
    this.logger.info(`✅ Chamada ${callSid} → ${status ?? 'desconhecido'}`);
  }
}
