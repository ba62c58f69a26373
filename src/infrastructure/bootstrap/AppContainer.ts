import type { Logger } from 'pino';
import type { FormatRegistryPort } from '../../application/ports/FormatRegistryPort.js';
import { ComparisonService } from '../../application/services/ComparisonService.js';
import { ConversionService } from '../../application/services/ConversionService.js';
import { FormatRegistry } from '../adapters/codec/FormatSelector.js';
import { loadConfig } from '../config/Config.js';
import type { AppConfig } from '../config/Config.js';
import { createLogger } from '../logging/Logger.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  logger?: Logger;
  formats?: FormatRegistryPort;
}

export class AppContainer {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly formats: FormatRegistryPort;
  readonly conversionService: ConversionService;
  readonly comparisonService: ComparisonService;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    this.logger = overrides.logger ?? createLogger(this.config);
    this.formats = overrides.formats ?? new FormatRegistry();

    this.conversionService = new ConversionService(
      this.formats,
      this.logger.child({ module: 'conversion' }),
    );
    this.comparisonService = new ComparisonService(
      this.formats,
      this.logger.child({ module: 'comparison' }),
    );
  }
}
