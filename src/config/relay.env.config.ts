import dotenv from 'dotenv';
import { cleanEnv, str, num, makeValidator, EnvError } from 'envalid';
import type { CleanedEnv } from 'envalid';
import { ConfigurationError } from '../middleware/relay.errorHandler.middleware';
import { configureLogger } from '../utils/relay.logger.utils';

/**
 * ========================================
 * RELAY SERVICE ENVIRONMENT CONFIGURATION
 * ========================================
 *
 * Validates and exports all required environment variables.
 * Fails fast if a credential is missing or empty.
 */

const required = makeValidator<string>((input: string) => {
  if (typeof input !== 'string' || input.trim() === '') {
    throw new EnvError('must be a non-empty string');
  }
  return input;
});

const specs = {
  // Service
  NODE_ENV: str({ choices: ['development', 'production', 'test'], default: 'development' }),
  PORT: num({ default: 8000 }),
  SERVICE_NAME: str({ default: 'whatsapp-assistant-relay' }),

  // WhatsApp Cloud API
  ACCESS_TOKEN: required(),
  PHONE_NUMBER_ID: required(),
  VERIFY_TOKEN: str({ default: '12345' }),
  WHATSAPP_API_VERSION: str({ default: 'v22.0' }),

  // OpenAI Assistants
  OPENAI_API_KEY: required(),
  OPENAI_ASSISTANT_ID: required(),
  ASSISTANT_NAME: str({ default: 'WhatsApp Assistant' }),
  ASSISTANT_INSTRUCTIONS: str({ default: 'You are a helpful assistant.' }),

  // Run polling
  RUN_POLL_INTERVAL_MS: num({ default: 1000 }),
  RUN_MAX_POLL_ATTEMPTS: num({ default: 10 }),
  RUN_TIMEOUT_MS: num({ default: 0 }), // 0 = bounded by the poll budget only

  // Outbound HTTP
  HTTP_TIMEOUT_MS: num({ default: 30000 }),

  // Conversation directory bounds (0 = unbounded)
  CONVERSATION_TTL_SECONDS: num({ default: 0 }),
  CONVERSATION_MAX_ENTRIES: num({ default: 0 }),

  // Logging
  LOG_LEVEL: str({ choices: ['error', 'warn', 'info', 'debug'], default: 'info' }),
};

export type RelayEnv = CleanedEnv<typeof specs>;

/**
 * Validate a raw environment. Throws ConfigurationError naming every
 * variable that is missing or invalid.
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): RelayEnv {
  const env = cleanEnv(source, specs, {
    reporter: ({ errors }) => {
      const invalid = Object.keys(errors);
      if (invalid.length > 0) {
        throw new ConfigurationError(
          `Missing or invalid environment variables: ${invalid.join(', ')}`,
          invalid
        );
      }
    },
  });

  if (env.RUN_MAX_POLL_ATTEMPTS < 1) {
    throw new ConfigurationError('RUN_MAX_POLL_ATTEMPTS must be at least 1', ['RUN_MAX_POLL_ATTEMPTS']);
  }

  if (env.RUN_POLL_INTERVAL_MS < 0 || env.RUN_TIMEOUT_MS < 0) {
    throw new ConfigurationError(
      'RUN_POLL_INTERVAL_MS and RUN_TIMEOUT_MS must not be negative',
      ['RUN_POLL_INTERVAL_MS', 'RUN_TIMEOUT_MS']
    );
  }

  if (env.CONVERSATION_TTL_SECONDS < 0 || env.CONVERSATION_MAX_ENTRIES < 0) {
    throw new ConfigurationError(
      'Conversation bounds must not be negative',
      ['CONVERSATION_TTL_SECONDS', 'CONVERSATION_MAX_ENTRIES']
    );
  }

  return env;
}

export interface LoadEnvOptions {
  /** Defaults to `.env` in the working directory */
  path?: string;
  /** Target for the parsed file; defaults to process.env */
  processEnv?: Record<string, string>;
}

/**
 * Load `.env`, validate the result and hand the logging settings to the
 * logger, which was built before the file was read.
 */
export function loadEnv(options: LoadEnvOptions = {}): RelayEnv {
  const { path, processEnv } = options;
  dotenv.config(processEnv ? { path, processEnv } : { path });

  const env = validateEnv(processEnv ?? process.env);

  configureLogger({
    level: env.LOG_LEVEL,
    service: env.SERVICE_NAME,
    environment: env.NODE_ENV
  });

  return env;
}
