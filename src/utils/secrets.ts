/**
 * Secrets loading utilities
 * Supports loading secrets from:
 * - .env.nodepool file (for local use)
 * - NODEPOOL_SECRETS environment variable (JSON string, for CI)
 */

import { existsSync, readFileSync } from 'fs';
import { ENV_FILE_PATH, SECRETS_ENV_VAR } from '../constants';
import { ConfigError, toError } from './errors';
import { printDebug } from './output';

/**
 * Parse a dotenv file content into key-value pairs
 */
export function parseDotenv(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    
    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) continue;
    
    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();
    
    // Remove surrounding quotes
    if (value.length >= 2 &&
        ((value.startsWith('"') && value.endsWith('"')) ||
         (value.startsWith("'") && value.endsWith("'")))) {
      value = value.slice(1, -1);
    }
    
    if (key) result[key] = value;
  }
  
  return result;
}

/**
 * Parse the JSON object held by NODEPOOL_SECRETS. Non-string values are ignored.
 */
export function parseSecretsJson(raw: string): Record<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${SECRETS_ENV_VAR}: ${toError(error).message}`, 'It must hold a JSON object of strings');
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`${SECRETS_ENV_VAR} must hold a JSON object`);
  }

  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string') {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Load secrets into the given environment
 * Priority: .env.nodepool > NODEPOOL_SECRETS
 */
export function loadSecrets(env: NodeJS.ProcessEnv = process.env, envFilePath: string = ENV_FILE_PATH): void {
  let secrets: Record<string, string> | null = null;
  let source = '';

  if (existsSync(envFilePath)) {
    secrets = parseDotenv(readFileSync(envFilePath, 'utf-8'));
    source = envFilePath;
  } else {
    const secretsEnv = env[SECRETS_ENV_VAR];
    if (secretsEnv) {
      secrets = parseSecretsJson(secretsEnv);
      source = SECRETS_ENV_VAR;
    }
  }

  if (!secrets) {
    return;
  }

  for (const [key, value] of Object.entries(secrets)) {
    if (value.trim() !== '') {
      env[key] = value;
    }
  }

  printDebug(`Loaded secrets from ${source}`, { count: Object.keys(secrets).length });
}
