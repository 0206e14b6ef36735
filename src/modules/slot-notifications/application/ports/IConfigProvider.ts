import type { AppConfig } from '../../domain/types';

/**
 * IConfigProvider Port Interface
 *
 * @throws ConfigError when the configuration cannot be read or is invalid
 */
export interface IConfigProvider {
  load(): Promise<AppConfig>;
}
