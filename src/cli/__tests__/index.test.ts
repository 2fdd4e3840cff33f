import { resolveAppConfig } from '../../server/config';
import { createService } from '../index';

describe('createService', () => {
  it('wires speech backends only when an OpenAI key is configured', () => {
    const withSpeech = createService(
      resolveAppConfig({ OPENROUTER_API_KEY: 'test-key', OPENAI_API_KEY: 'test-key', DISPATCH_DELAY_MS: '2000' }),
    );
    const withoutSpeech = createService(resolveAppConfig({ OPENROUTER_API_KEY: 'test-key' }));

    expect(withSpeech.getStatus().voice).toMatchObject({ stt: true, tts: true });
    expect(withSpeech.controller.state.dispatchDelayMs).toBe(2000);
    expect(withoutSpeech.getStatus().voice).toMatchObject({ stt: false, tts: false });
  });

  it('refuses to start without an OpenRouter key', () => {
    expect(() => createService(resolveAppConfig({}))).toThrow('OPENROUTER_API_KEY is not set');
  });
});
