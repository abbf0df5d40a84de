import { ConfigService } from '@nestjs/config';
import { AppConfigService } from '../../src/modules/app/app-config.service';

export function makeAppConfig(env: Record<string, string> = {}): AppConfigService {
  return new AppConfigService(new ConfigService(env));
}
