import { ConfigService } from '@nestjs/config';
import { join } from 'path';
import appConfig, { AppConfig } from '../src/config/app.config';

export const FIXTURES = join(__dirname, 'fixtures');

type ConfigOverrides = {
  [K in keyof AppConfig]?: AppConfig[K] extends object ? Partial<AppConfig[K]> : AppConfig[K];
};

/** The default configuration, pointed at the test fixtures. */
export function testAppConfig(overrides: ConfigOverrides = {}): AppConfig {
  const base = appConfig({ LABELS_FILE: join(FIXTURES, 'labels_ja.json') });

  return {
    port: overrides.port ?? base.port,
    clusterWorkers: overrides.clusterWorkers ?? base.clusterWorkers,
    media: { ...base.media, ...overrides.media },
    model: { ...base.model, ...overrides.model },
    labels: { ...base.labels, ...overrides.labels },
  };
}

export function testConfig(overrides: ConfigOverrides = {}): ConfigService<AppConfig, true> {
  return new ConfigService<AppConfig, true>(testAppConfig(overrides));
}
