import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { logError, logInfo } from './logger';
import { type AdapterOptions, optionsSchema } from './options.schema';

export const DEFAULT_OPTIONS_PATH = 'data/options.json';

type Environment = Record<string, string | undefined>;

const logIssues = (source: string, error: z.ZodError) => {
  logError(`[Options] Error validating ${source}:`);
  for (const issue of error.issues) {
    logError(`[Options]   - ${issue.path.join('.')}: ${issue.message}`);
  }
};

/**
 * Validate raw options and apply environment overrides.
 * Broker credentials usually come from the environment rather than the checked-in file.
 */
export const parseOptions = (json: unknown, env: Environment = process.env, source = 'options'): AdapterOptions => {
  const result = optionsSchema.safeParse(json);
  if (!result.success) {
    logIssues(source, result.error);
    throw new ConfigurationError(`Invalid ${source}`, { cause: result.error });
  }

  const options = result.data;
  return {
    ...options,
    url: env.MQTT_URL || options.url,
    clientId: env.MQTT_CLIENT_ID || options.clientId,
    connection: {
      ...options.connection,
      username: env.MQTT_USERNAME || options.connection.username,
      password: env.MQTT_PASSWORD || options.connection.password,
    },
  };
};

export const loadOptions = (path: string = DEFAULT_OPTIONS_PATH, env: Environment = process.env): AdapterOptions => {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path).toString());
  } catch (error) {
    logError(`[Options] Error reading or parsing ${path}`, error);
    throw new ConfigurationError(`Unable to read options from ${path}`, { cause: error });
  }
  const options = parseOptions(json, env, path);
  logInfo(`[Options] Loaded ${path} (clientId=${options.clientId}, topics=${options.topics.length})`);
  return options;
};
