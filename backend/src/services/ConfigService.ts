/**
 * Loads the destination and service configuration once per process.
 *
 * Sources, first match wins:
 * - TRANSFER_CONFIG: the configuration document as inline JSON
 * - TRANSFER_CONFIG_PATH: path to a JSON configuration file
 * - the bundled backend/config/transfer-config.json
 */

import { readFileSync } from 'fs';
import type { TransferConfig } from '../types/config.js';
import { ConfigurationError } from '../utils/errorHandler.js';
import { ValidationService } from './ValidationService.js';

const DEFAULT_CONFIG_URL = new URL('../../config/transfer-config.json', import.meta.url);

export class ConfigService {
  private static instance: ConfigService | undefined;
  private readonly config: Readonly<TransferConfig>;

  private constructor(config: TransferConfig) {
    for (const service of Object.values(config.services)) {
      Object.freeze(service);
    }
    Object.freeze(config.services);
    Object.freeze(config.destinations);
    this.config = Object.freeze(config);
  }

  static getInstance(): ConfigService {
    if (!ConfigService.instance) {
      ConfigService.instance = ConfigService.fromEnvironment(process.env);
    }
    return ConfigService.instance;
  }

  /**
   * Forgets the loaded configuration; the next getInstance() reloads it
   */
  static reset(): void {
    ConfigService.instance = undefined;
  }

  static fromEnvironment(env: NodeJS.ProcessEnv): ConfigService {
    if (env.TRANSFER_CONFIG) {
      return ConfigService.fromJson(env.TRANSFER_CONFIG, 'TRANSFER_CONFIG');
    }

    const source = env.TRANSFER_CONFIG_PATH || DEFAULT_CONFIG_URL;
    let text: string;
    try {
      text = readFileSync(source, 'utf8');
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read transfer configuration from ${source.toString()}`,
        error
      );
    }

    return ConfigService.fromJson(text, source.toString());
  }

  static fromJson(text: string, origin: string): ConfigService {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new ConfigurationError(`Invalid JSON in transfer configuration ${origin}`, error);
    }

    return ConfigService.fromObject(parsed);
  }

  static fromObject(value: unknown): ConfigService {
    const result = ValidationService.validateConfig(value);
    if (!result.isValid) {
      throw new ConfigurationError(`Invalid transfer configuration: ${result.error}`);
    }

    console.log(
      `Loaded transfer configuration with destinations: ${Object.keys(result.value.destinations).join(', ')}`
    );
    return new ConfigService(result.value);
  }

  getConfig(): Readonly<TransferConfig> {
    return this.config;
  }
}
