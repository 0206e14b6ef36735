import { promises as fs } from 'fs';
import { parse as parseYaml } from 'yaml';
import type { IConfigProvider } from '../../application/ports/IConfigProvider';
import type { AppConfig } from '../../domain/types';
import { expandEnvVars, type Environment } from '../../config/env-expansion';
import { toAppConfig } from '../../config/app-config';
import { ConfigFileSchema } from '../../../../shared/validation/schemas';
import { ConfigError } from '../../../../domain/errors/ConfigError';
import { logger } from '../../../../shared/logger';
import { errorMessage, hasErrorCode } from '../../../../shared/errors';

/**
 * YamlConfigProvider
 *
 * Loads the YAML configuration file, expands environment references,
 * validates the document with Zod and maps it to AppConfig.
 * Every failure is a ConfigError.
 */
export class YamlConfigProvider implements IConfigProvider {
  public constructor(
    private readonly filePath: string,
    private readonly env: Environment = process.env
  ) {}

  public async load(): Promise<AppConfig> {
    const content = await this.read();

    let document: unknown;
    try {
      document = parseYaml(content);
    } catch (error) {
      throw new ConfigError(
        `Config file ${this.filePath} is not valid YAML: ${errorMessage(error)}`,
        undefined,
        { cause: error }
      );
    }

    if (document === null || document === undefined) {
      throw new ConfigError(`Config file ${this.filePath} is empty`);
    }

    const result = ConfigFileSchema.safeParse(expandEnvVars(document, this.env));
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new ConfigError(`Invalid configuration in ${this.filePath}: ${issues.join('; ')}`, issues);
    }

    const config = toAppConfig(result.data);
    logger.debug({
      msg: 'Configuration loaded',
      filePath: this.filePath,
      users: config.users.length,
      windows: config.settings.notificationWindows.length,
    });
    return config;
  }

  private async read(): Promise<string> {
    try {
      return await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        throw new ConfigError(`Config file not found: ${this.filePath}`, undefined, { cause: error });
      }
      throw new ConfigError(
        `Cannot read config file ${this.filePath}: ${errorMessage(error)}`,
        undefined,
        { cause: error }
      );
    }
  }
}
