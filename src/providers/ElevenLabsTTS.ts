/**
 * ElevenLabsTTS - Text-to-Speech usando ElevenLabs
 *
 * Pede μ-law 8kHz (ulaw_8000), o formato nativo do Media Stream do Twilio:
 * o áudio vai direto para os frames, sem transcodificação.
 */

import { ElevenLabsClient } from '@elevenlabs/elevenlabs-js';
import { ITTS, ElevenLabsConfig, TTSResult } from '../types';
import { Logger } from '../utils/Logger';

// μ-law 8kHz mono: 1 byte por amostra
const ULAW_BYTES_PER_SECOND = 8000;

export class ElevenLabsTTS implements ITTS {
  private client: ElevenLabsClient;
  private config: ElevenLabsConfig;
  private logger: Logger;

  constructor(config: ElevenLabsConfig) {
    this.config = config;
    this.logger = new Logger('ElevenLabs-TTS');
    this.client = new ElevenLabsClient({
      apiKey: config.apiKey,
    });
  }

  /**
   * Sintetiza a frase e junta o corpo em streaming num único Buffer
   */
  async synthesize(text: string, signal?: AbortSignal): Promise<TTSResult> {
    const elapsed = this.logger.time(`🔊 TTS "${text.substring(0, 30)}"`);

    const stream = await this.client.textToSpeech.convert(
      this.config.voiceId,
      {
        text,
        modelId: this.config.model,
        outputFormat: 'ulaw_8000',
        voiceSettings: {
          stability: this.config.stability,
          similarityBoost: this.config.similarityBoost,
          style: this.config.style,
          useSpeakerBoost: true,
        },
      },
      { abortSignal: signal }
    );

    // Converter ReadableStream para Buffer
    const chunks: Buffer[] = [];
    const reader = stream.getReader();

    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      chunks.push(Buffer.from(value));
    }

    const audioBuffer = Buffer.concat(chunks);
    const audioDuration = audioBuffer.length / ULAW_BYTES_PER_SECOND;

    this.logger.debug(
      `✅ TTS (${elapsed()}ms): ${text.length} chars → ${audioBuffer.length} bytes (~${audioDuration.toFixed(1)}s)`
    );

    return {
      audioBuffer,
      duration: audioDuration,
      characterCount: text.length,
    };
  }
}
