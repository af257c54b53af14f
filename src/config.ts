/**
 * Configuration loader
 */

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import type { CommerceClientConfig } from './api/client.js';
import { ConfigurationError } from './errors.js';

// Load .env file
loadEnv();

export interface AppConfig {
  client: CommerceClientConfig;
  outputDir: string;
}

const DEFAULT_OUTPUT_DIR = './dynamic';

const required = (name: string) => z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);

const EnvSchema = z.object({
  CTP_AUTH_URL: required('CTP_AUTH_URL').url('CTP_AUTH_URL must be a URL'),
  CTP_API_URL: required('CTP_API_URL').url('CTP_API_URL must be a URL'),
  CTP_PROJECT_KEY: required('CTP_PROJECT_KEY'),
  CTP_CLIENT_ID: required('CTP_CLIENT_ID'),
  CTP_CLIENT_SECRET: required('CTP_CLIENT_SECRET'),
  CTP_OUTPUT_DIR: z.string().trim().min(1).default(DEFAULT_OUTPUT_DIR),
  CTP_TIMEOUT_MS: z.coerce
    .number()
    .int('CTP_TIMEOUT_MS must be a whole number of milliseconds')
    .positive('CTP_TIMEOUT_MS must be positive')
    .optional(),
  CTP_USER_AGENT: z.string().trim().min(1).optional(),
});

const stripTrailingSlash = (url: string) => url.replace(/\/+$/, '');

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))];
    const details = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`, variables);
  }

  const values = parsed.data;

  return {
    client: {
      authUrl: stripTrailingSlash(values.CTP_AUTH_URL),
      apiUrl: stripTrailingSlash(values.CTP_API_URL),
      projectKey: values.CTP_PROJECT_KEY,
      clientId: values.CTP_CLIENT_ID,
      clientSecret: values.CTP_CLIENT_SECRET,
      userAgent: values.CTP_USER_AGENT,
      timeoutMs: values.CTP_TIMEOUT_MS,
    },
    outputDir: values.CTP_OUTPUT_DIR,
  };
}
