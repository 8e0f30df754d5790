/**
 * @fileoverview Monitor configuration loading from YAML.
 * Validates the file and fills in defaults for anything it leaves out.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

// Schema for monitor configuration
const MonitorConfigSchema = z.object({
  link: z
    .object({
      host: z.string().min(1).default('localhost'),
      port: z.number().int().min(1).max(65535).default(8080),
      handshakeTimeoutMs: z.number().int().positive().default(10_000),
      handshakePolicy: z.enum(['lenient', 'strict']).default('lenient'),
    })
    .default({}),
  history: z
    .object({
      capacity: z.number().int().positive().default(100),
    })
    .default({}),
  http: z
    .object({
      port: z.number().int().min(0).max(65535).default(3000),
    })
    .default({}),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type MonitorConfig = z.infer<typeof MonitorConfigSchema>;

const DEFAULT_CONFIG_FILE = 'config/monitor.yaml';

/**
 * Validate an already-parsed configuration object. An empty document yields
 * the defaults.
 * @throws {Error} listing the invalid fields
 */
export function parseMonitorConfig(raw: unknown): MonitorConfig {
  const result = MonitorConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid monitor configuration: ${details}`);
  }
  return result.data;
}

/**
 * Load and validate the monitor configuration.
 *
 * Config file is loaded from:
 * - the given path, or the CONFIG_PATH environment variable if set
 *   (the file must exist)
 * - otherwise ./config/monitor.yaml relative to cwd, falling back to the
 *   defaults when that file is absent
 */
export function loadMonitorConfig(configPath?: string): MonitorConfig {
  // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
  const explicitPath = configPath ?? process.env['CONFIG_PATH'];
  const path = explicitPath ?? join(process.cwd(), DEFAULT_CONFIG_FILE);

  if (explicitPath === undefined && !existsSync(path)) {
    return parseMonitorConfig({});
  }

  const rawConfig: unknown = parseYaml(readFileSync(path, 'utf8'));
  return parseMonitorConfig(rawConfig);
}
