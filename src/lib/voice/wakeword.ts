import { createLogger } from '../logging';
import { floatToPcm16 } from './audio';

const logger = createLogger('voice:wakeword');

/** Scores one PCM16 frame against every loaded wake phrase model. */
export interface WakewordBackend {
  predict(pcm16: Int16Array): Record<string, number>;
}

export type WakewordConfig = {
  enabled: boolean;
  threshold: number;
  models: string[];
};

export const DEFAULT_WAKEWORD_CONFIG: WakewordConfig = {
  enabled: false,
  threshold: 0.55,
  models: ['hey assistant'],
};

const normalizeLabel = (value: string) => value.toLowerCase().replace(/[^a-z0-9]+/g, '_');

export class WakewordDetector {
  private config: WakewordConfig;

  constructor(
    config: Partial<WakewordConfig> = {},
    private readonly backend: WakewordBackend | null = null,
  ) {
    this.config = { ...DEFAULT_WAKEWORD_CONFIG, ...config };
    if (this.config.enabled && !backend) {
      logger.warn('wake word gate enabled without a detector backend; it will never fire');
    }
  }

  get enabled() {
    return this.config.enabled;
  }

  setConfig(update: Partial<WakewordConfig>) {
    this.config = {
      enabled: update.enabled ?? this.config.enabled,
      threshold: update.threshold ?? this.config.threshold,
      models: update.models && update.models.length > 0 ? [...update.models] : this.config.models,
    };
  }

  /** True when a configured phrase scores at or above the threshold. */
  detect(frame: Float32Array): boolean {
    if (!this.config.enabled) return true;
    if (!this.backend) return false;
    try {
      const scores = this.backend.predict(floatToPcm16(frame));
      const models = this.config.models.map(normalizeLabel);
      return Object.entries(scores).some(([label, score]) => {
        const key = normalizeLabel(label);
        return score >= this.config.threshold && models.some((model) => key.includes(model));
      });
    } catch (error) {
      logger.once('predict-failed', 'wake word backend failed; treating as not detected', error);
      return false;
    }
  }
}
