/**
 * Phone Voice Agent
 *
 * Stack:
 * - Twilio: Telefonia (webhooks TwiML + Media Streams)
 * - OpenAI: LLM em streaming (Chat Completions)
 * - ElevenLabs: Text-to-Speech (μ-law 8kHz)
 *
 * A resposta do agente é falada frase a frase pelo Media Stream
 * enquanto o LLM ainda está gerando.
 */

import { VoiceAgent } from './core/VoiceAgent';
import { TwilioProvider } from './providers/TwilioProvider';
import { OpenAILLM } from './providers/OpenAILLM';
import { ElevenLabsTTS } from './providers/ElevenLabsTTS';
import { Logger } from './utils/Logger';
import { config, validateConfig } from './config';

async function main(): Promise<void> {
  const logger = new Logger('Main');
  logger.info('🚀 Iniciando Phone Voice Agent...');

  validateConfig();

  const twilio = new TwilioProvider(
    {
      accountSid: config.twilio.accountSid,
      authToken: config.twilio.authToken,
      publicUrl: config.server.publicUrl,
    },
    config.agent
  );
  const llm = new OpenAILLM(config.openai);
  const tts = new ElevenLabsTTS(config.elevenlabs);

  const agent = new VoiceAgent({
    llm,
    tts,
    twilio,
    systemPrompt: config.agent.systemPrompt,
    apology: config.agent.apology,
    audio: config.audio,
    policy: {
      terminationPhrases: config.agent.terminationPhrases,
      maxEmptyResults: config.agent.maxEmptyResults,
      sessionIdleTimeoutMs: config.agent.sessionIdleTimeoutMs,
    },
    publicUrl: config.server.publicUrl,
    validateSignature: config.twilio.validateSignature,
    sweepIntervalMs: config.agent.sweepIntervalMs,
    summarizeOnHangup: config.agent.summarizeOnHangup,
  });

  // Iniciar servidor
  const port = await agent.start(config.server.port, config.server.host);
  logger.info(`✅ Servidor rodando na porta ${port}`);
  logger.info(`📞 Webhook de voz: ${config.server.publicUrl}/webhook/voice`);

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    logger.info(`🛑 ${signal} recebido, encerrando...`);
    agent
      .stop()
      .then(() => process.exit(0))
      .catch((error) => {
        logger.error('Erro ao encerrar:', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error) => {
  new Logger('Main').error('❌ Falha ao iniciar:', error);
  process.exit(1);
});
