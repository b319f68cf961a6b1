/**
 * Data loader — reads the data directory once at startup.
 *
 *   data/
 *     config.yaml        ← server, providers, sources, session
 *     personas.yaml      ← the five personas
 *     query-rules.yaml   ← search-term rules + stop-words
 *     users.json         ← login credentials
 *     chat-history.json  ← written at runtime
 *
 * Everything is validated; a bad file stops the server before it
 * starts listening.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import type { ZodType, ZodTypeDef } from 'zod';
import { readYaml } from './yaml.js';
import { ConfigurationError } from './errors.js';
import {
  configSchema,
  personasSchema,
  queryPolicySchema,
  usersSchema,
} from './schema.js';
import type { AppConfig, Persona, QueryPolicy, User } from '../types/index.js';

export interface LoadedData {
  config: AppConfig;
  personas: Persona[];
  policy: QueryPolicy;
  users: User[];
}

/**
 * Load all data from the data directory.
 */
export function loadData(dataDir: string, env: NodeJS.ProcessEnv = process.env): LoadedData {
  const configPath = join(dataDir, 'config.yaml');
  const personasPath = join(dataDir, 'personas.yaml');
  const rulesPath = join(dataDir, 'query-rules.yaml');
  const usersPath = join(dataDir, 'users.json');

  if (!existsSync(configPath)) {
    throw new ConfigurationError(`Config not found at ${configPath}.`);
  }
  if (!existsSync(personasPath)) {
    throw new ConfigurationError(`Personas not found at ${personasPath}.`);
  }

  const config = applyEnv(
    validate(configSchema, readYaml(configPath) ?? {}, configPath),
    env
  );
  const personas = validate(personasSchema, readYaml(personasPath), personasPath);

  const policy = existsSync(rulesPath)
    ? validate(queryPolicySchema, readYaml(rulesPath) ?? {}, rulesPath)
    : { rules: [], stopWords: [] };

  let users: User[] = [];
  if (existsSync(usersPath)) {
    const raw: unknown = JSON.parse(readFileSync(usersPath, 'utf-8'));
    users = validate(usersSchema, raw, usersPath);
  } else {
    console.warn(`[personachat] No users file at ${usersPath}; login is disabled.`);
  }

  return { config, personas, policy, users };
}

function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown, file: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid ${file}: ${issues}`);
  }
  return result.data;
}

/**
 * Environment wins over config.yaml for deployment-specific values.
 */
function applyEnv(config: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
  const port = env.PORT ? Number.parseInt(env.PORT, 10) : NaN;

  return {
    ...config,
    server: {
      port: Number.isFinite(port) ? port : config.server.port,
      host: env.HOST ?? config.server.host,
    },
    llm: {
      ...config.llm,
      providers: config.llm.providers.map((provider) =>
        provider.type === 'openai' && !provider.apiKey && env.OPENAI_API_KEY
          ? { ...provider, apiKey: env.OPENAI_API_KEY }
          : provider
      ),
    },
  };
}
