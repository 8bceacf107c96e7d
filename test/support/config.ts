import { ConfigService } from '@nestjs/config';
import { AppConfigService } from '../../src/config/app-config.service';

export function createTestConfig(
  values: Record<string, string> = {},
): AppConfigService {
  return new AppConfigService(new ConfigService(values));
}
