#!/usr/bin/env node
import { createLogger, describeError } from '../lib/logging';
import { OpenRouterEngine } from '../lib/llm/openrouter-engine';
import { OpenAiSpeechToText } from '../lib/voice/stt';
import { OpenAiTextToSpeech } from '../lib/voice/tts';
import { loadEnvFiles, resolveAppConfig, type AppConfig } from '../server/config';
import { createProxyServer } from '../server/http';
import { ProxyService } from '../server/proxy-service';

const logger = createLogger('cli');

export const createService = (config: AppConfig): ProxyService => {
  const engine = new OpenRouterEngine({
    apiKey: config.llm.apiKey,
    model: config.llm.model,
    baseURL: config.llm.baseURL,
    temperature: config.llm.temperature,
    maxTokens: config.llm.maxTokens,
    reasoning: config.llm.reasoning,
  });

  const speech = config.speech;
  const hasSpeechKey = Boolean(speech.openaiApiKey);
  if (!hasSpeechKey) {
    logger.warn('OPENAI_API_KEY is not set; voice input and output are disabled');
  }

  return new ProxyService({
    engine,
    // The gateway client is attached by the embedding host through setGateway.
    gateway: null,
    stt: hasSpeechKey
      ? new OpenAiSpeechToText({
          apiKey: speech.openaiApiKey,
          baseURL: speech.openaiBaseURL,
          model: speech.sttModel,
          language: speech.sttLanguage,
        })
      : null,
    tts: hasSpeechKey
      ? new OpenAiTextToSpeech({
          apiKey: speech.openaiApiKey,
          baseURL: speech.openaiBaseURL,
          model: speech.ttsModel,
          voice: speech.ttsVoice,
        })
      : null,
    voice: {
      vad: config.vad,
      wakeword: config.wakeword,
      ttsEnabled: speech.ttsEnabled,
    },
    maxHistoryPairs: config.proxy.historyPairs,
    dispatchDelayMs: config.proxy.dispatchDelayMs,
    dispatchTickMs: config.proxy.dispatchTickMs,
    compressedContext: config.proxy.compressedContext,
  });
};

const main = async () => {
  loadEnvFiles();
  const config = resolveAppConfig(process.env);
  const service = createService(config);
  const server = createProxyServer(service);

  const address = await server.listen(config.port, config.host);
  service.start();
  logger.info(`listening on http://${address.address}:${address.port}`, { model: config.llm.model });

  const shutdown = () => {
    logger.info('shutting down');
    Promise.all([service.stop(), server.close()])
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('shutdown failed', describeError(error));
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
};

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('failed to start', describeError(error));
    process.exit(1);
  });
}
