import { ConfigService } from '@config/config.service';
import * as fs from 'fs';
import { join } from 'path';

export const TEST_ENV: Record<string, string> = {
  GMP_PASSWORD: 'test-secret',
  GMP_RETRY_DELAY_MS: '0',
  GMP_TIMEOUT_MS: '500',
  ENABLE_FILE_LOGGING: 'false',
};

export function createTestConfig(overrides: Record<string, string> = {}): ConfigService {
  return new ConfigService({ ...TEST_ENV, ...overrides });
}

export function loadFixture(name: string): string {
  return fs.readFileSync(join(__dirname, '..', 'fixtures', name), 'utf8');
}
