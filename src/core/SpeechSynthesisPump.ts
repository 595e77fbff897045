/**
 * SpeechSynthesisPump - Frase → áudio μ-law → frames no Media Stream
 *
 * Responsável por:
 * - Sintetizar cada frase no TTS (8kHz μ-law)
 * - Fatiar o áudio em frames de tamanho fixo (160 bytes = 20ms)
 * - Entregar os frames em ordem, com pacing, na conexão da chamada
 *
 * Pacing: os primeiros `pacingLeadFrames` saem em rajada (enchem o buffer
 * do carrier); depois, o frame i só sai a partir de
 * início + (i - lead) × frameDurationMs. Com frameDurationMs = 0 não há espera.
 */

import { ITTS } from '../types';
import { CallConnectionRegistry } from './CallConnectionRegistry';
import { Logger } from '../utils/Logger';
import { sleep as defaultSleep } from '../utils/sleep';

export interface DeliveryResult {
  delivered: number;
  abandoned: boolean;
}

export interface SpeechSynthesisPumpOptions {
  tts: ITTS;
  registry: CallConnectionRegistry;
  frameBytes: number;
  frameDurationMs: number;
  pacingLeadFrames: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

export interface SpeakHooks {
  /** Chamado quando o áudio da frase está pronto, antes do primeiro frame */
  onAudioReady?: (frames: number) => void;
}

export class SpeechSynthesisPump {
  private tts: ITTS;
  private registry: CallConnectionRegistry;
  private frameBytes: number;
  private frameDurationMs: number;
  private pacingLeadFrames: number;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private now: () => number;
  private logger: Logger;

  constructor(options: SpeechSynthesisPumpOptions) {
    if (!Number.isInteger(options.frameBytes) || options.frameBytes <= 0) {
      throw new Error(`frameBytes must be a positive integer, got ${options.frameBytes}`);
    }
    this.tts = options.tts;
    this.registry = options.registry;
    this.frameBytes = options.frameBytes;
    this.frameDurationMs = Math.max(0, options.frameDurationMs);
    this.pacingLeadFrames = Math.max(0, options.pacingLeadFrames);
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.logger = new Logger('Pump');
  }

  /**
   * Sintetiza uma frase; falha ou áudio vazio → null (a frase é pulada)
   */
  async synthesize(sentence: string, signal?: AbortSignal): Promise<Buffer | null> {
    try {
      const result = await this.tts.synthesize(sentence, signal);
      if (result.audioBuffer.length === 0) {
        this.logger.warn(`🔇 TTS devolveu áudio vazio para "${sentence.substring(0, 40)}"`);
        return null;
      }
      return result.audioBuffer;
    } catch (error) {
      if (signal?.aborted) {
        this.logger.debug('TTS cancelado');
      } else {
        this.logger.error(`❌ Falha no TTS para "${sentence.substring(0, 40)}":`, error);
      }
      return null;
    }
  }

  /**
   * Fatia o áudio em frames de frameBytes; o último pode ser menor
   */
  frame(audio: Buffer): Buffer[] {
    const frames: Buffer[] = [];
    for (let offset = 0; offset < audio.length; offset += this.frameBytes) {
      frames.push(audio.subarray(offset, offset + this.frameBytes));
    }
    return frames;
  }

  /**
   * Escreve os frames na conexão da chamada, segurando o write lock
   * durante a frase inteira. Conexão ausente ou fechada → abandoned.
   */
  async deliver(
    callId: string,
    frames: Buffer[],
    signal?: AbortSignal,
    label = 'sentence'
  ): Promise<DeliveryResult> {
    const connection = this.registry.lookup(callId);
    if (!connection) {
      this.logger.debug(`📭 Call ${callId} sem conexão de mídia; frase descartada`);
      return { delivered: 0, abandoned: true };
    }

    return connection.withWriteLock(async () => {
      const startedAt = this.now();
      let delivered = 0;

      for (let i = 0; i < frames.length; i++) {
        if (signal?.aborted || !connection.isOpen()) {
          return { delivered, abandoned: true };
        }

        if (this.frameDurationMs > 0 && i >= this.pacingLeadFrames) {
          const releaseAt = startedAt + (i - this.pacingLeadFrames) * this.frameDurationMs;
          const wait = releaseAt - this.now();
          if (wait > 0) {
            await this.sleep(wait, signal);
            if (signal?.aborted) return { delivered, abandoned: true };
          }
        }

        try {
          await connection.sendMedia(frames[i]);
        } catch (error) {
          this.logger.warn(`⚠️ Falha ao enviar frame ${i} da call ${callId}:`, error);
          return { delivered, abandoned: true };
        }
        delivered++;
      }

      if (delivered > 0) {
        try {
          await connection.sendMark(label);
        } catch (error) {
          this.logger.debug(`Mark "${label}" não enviado:`, error);
        }
      }

      return { delivered, abandoned: false };
    });
  }

  /**
   * Frase completa: sintetiza → fatia → entrega
   */
  async speak(
    callId: string,
    sentence: string,
    signal?: AbortSignal,
    hooks: SpeakHooks = {}
  ): Promise<DeliveryResult> {
    const audio = await this.synthesize(sentence, signal);
    if (!audio || signal?.aborted) {
      return { delivered: 0, abandoned: signal?.aborted ?? false };
    }

    const frames = this.frame(audio);
    hooks.onAudioReady?.(frames.length);
    return this.deliver(callId, frames, signal, sentence.substring(0, 32));
  }
}
