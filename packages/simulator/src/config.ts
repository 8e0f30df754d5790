/**
 * @fileoverview Simulator configuration loading from YAML.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { PinSchema } from '@sensor-link/protocol';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

const RangeSchema = z.object({
  min: z.number(),
  max: z.number(),
});

// Schema for a value generator
const GeneratorSchema = z.discriminatedUnion('kind', [
  RangeSchema.extend({ kind: z.literal('random') }),
  RangeSchema.extend({ kind: z.literal('sine'), periodMs: z.number().positive() }),
  z.object({ kind: z.literal('constant'), value: z.number() }),
]);

const SimulatedSensorSchema = z
  .object({
    pin: PinSchema,
    intervalMs: z.number().int().positive(),
    generator: GeneratorSchema,
  })
  .refine(
    ({ generator }) => generator.kind === 'constant' || generator.min <= generator.max,
    { message: 'generator min must not exceed max', path: ['generator'] }
  );

// Schema for the whole simulator configuration
const SimulatorConfigSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: z.number().int().min(0).max(65535),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  sensors: z.array(SimulatedSensorSchema),
});

export type GeneratorConfig = z.infer<typeof GeneratorSchema>;
export type SimulatedSensorConfig = z.infer<typeof SimulatedSensorSchema>;
export type SimulatorConfig = z.infer<typeof SimulatorConfigSchema>;

/**
 * Validate an already-parsed configuration object.
 * @throws {Error} listing the invalid fields
 */
export function parseSimulatorConfig(raw: unknown): SimulatorConfig {
  const result = SimulatorConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid simulator configuration: ${details}`);
  }

  const pins = new Set<string>();
  for (const sensor of result.data.sensors) {
    if (pins.has(sensor.pin)) {
      throw new Error(`Invalid simulator configuration: duplicate pin ${sensor.pin}`);
    }
    pins.add(sensor.pin);
  }

  return result.data;
}

/**
 * Load and validate the simulator configuration.
 *
 * Config file is loaded from:
 * - the given path
 * - otherwise the CONFIG_PATH environment variable if set
 * - otherwise ./config/simulator.yaml relative to cwd (project root)
 */
export function loadSimulatorConfig(configPath?: string): SimulatorConfig {
  // biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
  const envPath = process.env['CONFIG_PATH'];
  const path = configPath ?? envPath ?? join(process.cwd(), 'config/simulator.yaml');

  const rawConfig: unknown = parseYaml(readFileSync(path, 'utf8'));
  return parseSimulatorConfig(rawConfig);
}
