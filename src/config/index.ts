import { config } from 'dotenv';

config();

export type NodeEnv = 'development' | 'production' | 'test';

export interface AppConfig {
  PORT: number;
  NODE_ENV: NodeEnv;
  LOG_LEVEL: string;
  ALLOWED_ORIGINS?: string[];
  JSON_BODY_LIMIT: string;
  SERVICE_NAME: string;
  DISCORD_WEBHOOK_URL?: string;
  ENABLE_DISCORD_LOGGING: boolean;
}

class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const NODE_ENVS: NodeEnv[] = ['development', 'production', 'test'];
const LOG_LEVELS = ['error', 'warn', 'notify', 'info', 'http', 'verbose', 'debug', 'silly'];

function validateEnvironmentVariable(name: string, value: string | undefined, required: boolean = true): string {
  if (!value && required) {
    throw new ConfigurationError(`Required environment variable ${name} is not set`);
  }

  if (!value && !required) {
    return '';
  }

  if (value && value.trim() === '') {
    throw new ConfigurationError(`Environment variable ${name} cannot be empty`);
  }

  return value || '';
}

function validateNumericEnvironmentVariable(name: string, value: string | undefined, required: boolean = true, defaultValue?: number): number {
  const stringValue = validateEnvironmentVariable(name, value, required);

  if (!stringValue && !required && defaultValue !== undefined) {
    return defaultValue;
  }

  const numericValue = parseInt(stringValue, 10);

  if (isNaN(numericValue)) {
    throw new ConfigurationError(`Environment variable ${name} must be a valid number, got: ${stringValue}`);
  }

  if (numericValue < 0) {
    throw new ConfigurationError(`Environment variable ${name} must be a positive number, got: ${numericValue}`);
  }

  return numericValue;
}

function isNodeEnv(value: string): value is NodeEnv {
  return NODE_ENVS.some(env => env === value);
}

function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  try {
    const nodeEnv = validateEnvironmentVariable('NODE_ENV', env.NODE_ENV, false) || 'development';
    if (!isNodeEnv(nodeEnv)) {
      throw new ConfigurationError(`NODE_ENV must be one of: ${NODE_ENVS.join(', ')}. Got: ${nodeEnv}`);
    }

    const origins = validateEnvironmentVariable('ALLOWED_ORIGINS', env.ALLOWED_ORIGINS, false);

    const appConfig: AppConfig = {
      PORT: validateNumericEnvironmentVariable('PORT', env.PORT, false, 3000),
      NODE_ENV: nodeEnv,
      LOG_LEVEL: validateEnvironmentVariable('LOG_LEVEL', env.LOG_LEVEL, false) || 'info',
      ALLOWED_ORIGINS: origins ? origins.split(',').map(o => o.trim()).filter(Boolean) : undefined,
      JSON_BODY_LIMIT: validateEnvironmentVariable('JSON_BODY_LIMIT', env.JSON_BODY_LIMIT, false) || '1mb',
      SERVICE_NAME: validateEnvironmentVariable('SERVICE_NAME', env.SERVICE_NAME, false) || 'heating-brain',
      DISCORD_WEBHOOK_URL: validateEnvironmentVariable('DISCORD_WEBHOOK_URL', env.DISCORD_WEBHOOK_URL, false) || undefined,
      ENABLE_DISCORD_LOGGING: (env.ENABLE_DISCORD_LOGGING || 'false').toLowerCase() === 'true',
    };

    if (!LOG_LEVELS.includes(appConfig.LOG_LEVEL)) {
      throw new ConfigurationError(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}. Got: ${appConfig.LOG_LEVEL}`);
    }

    if (appConfig.PORT < 1024 || appConfig.PORT > 65535) {
      throw new ConfigurationError(`PORT must be between 1024 and 65535. Got: ${appConfig.PORT}`);
    }

    if (appConfig.DISCORD_WEBHOOK_URL && !appConfig.DISCORD_WEBHOOK_URL.startsWith('http')) {
      throw new ConfigurationError(`DISCORD_WEBHOOK_URL must be a valid URL starting with http/https. Got: ${appConfig.DISCORD_WEBHOOK_URL}`);
    }

    return appConfig;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    throw new ConfigurationError(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`);
  }
}

let Config: AppConfig;

try {
  Config = loadConfig();
} catch (error) {
  console.error('Configuration Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
}

export { Config, ConfigurationError, loadConfig, validateNumericEnvironmentVariable };
export default Config;
