import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { GatePolicy } from './types/index.js';

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern, 'g');
    return true;
  } catch {
    return false;
  }
}

const backendSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['anthropic', 'ollama']),
  model: z.string().min(1),
  base_url: z.string().url().optional(),
  max_tokens: z.number().int().positive().default(4096),
  temperature: z.number().min(0).max(1).default(0.3),
  // USD per million tokens
  pricing: z
    .object({
      input: z.number().nonnegative(),
      output: z.number().nonnegative()
    })
    .default({ input: 0, output: 0 })
});

const configSchema = z.object({
  server: z
    .object({
      port: z.number().int().positive().default(8088),
      host: z.string().default('127.0.0.1')
    })
    .default({}),
  auth: z
    .object({
      api_keys: z.array(z.string().min(1)).default([]),
      allowed_origins: z.array(z.string()).default(['http://localhost:*'])
    })
    .default({}),
  rate_limits: z
    .object({
      requests_per_minute: z.number().int().positive().default(60)
    })
    .default({}),
  inference: z
    .object({
      primary: backendSchema,
      secondary: backendSchema.optional()
    })
    .default({
      primary: { name: 'local', type: 'ollama', model: 'qwen2.5:14b' },
      secondary: {
        name: 'claude',
        type: 'anthropic',
        model: 'claude-3-5-sonnet-20241022',
        pricing: { input: 3, output: 15 }
      }
    }),
  orchestrator: z
    .object({
      max_rounds: z.number().int().positive().default(8),
      max_tools_per_round: z.number().int().positive().default(6),
      time_budget_ms: z.number().int().positive().default(120_000),
      call_timeout_ms: z.number().int().positive().default(60_000)
    })
    .default({}),
  gates: z
    .object({
      max_attempts: z.number().int().positive().default(2),
      sibling_prefix_length: z.number().int().positive().default(4),
      broad_prefix_length: z.number().int().positive().default(2),
      sibling_limit: z.number().int().positive().default(20),
      tracking_token_pattern: z
        .string()
        .refine(isValidPattern, { message: 'Invalid regular expression' })
        .default('\\b[A-Z]{2,5}-\\d{8}-\\d{3}(?:-[A-Z]+)?\\b'),
      block_on_invalid_code: z.boolean().default(false),
      extra_phrases: z.array(z.string().trim().min(1)).default([]),
      contact_line: z
        .object({
          en: z.string().default('For further details, contact the classification desk.'),
          he: z.string().default('לפרטים נוספים ניתן לפנות לצוות הסיווג.')
        })
        .default({})
    })
    .default({}),
  storage: z
    .object({
      database: z.string().default(resolve(homedir(), '.tariff-gate', 'tariff-gate.db')),
      // JSON array of reference records loaded into the dataset at startup
      reference_data: z.string().optional()
    })
    .default({}),
  audit: z
    .object({
      log_path: z.string().default(resolve(homedir(), '.tariff-gate', 'logs', 'audit.jsonl'))
    })
    .default({}),
  log: z
    .object({
      level: z.string().default('info'),
      pretty: z.boolean().default(false)
    })
    .default({})
});

export type BackendConfig = z.infer<typeof backendSchema>;
export type TariffGateConfig = z.infer<typeof configSchema>;

export const CONFIG_PATHS = [
  resolve(process.cwd(), 'tariff-gate.yaml'),
  resolve(homedir(), '.tariff-gate', 'config.yaml'),
  resolve(homedir(), '.config', 'tariff-gate', 'config.yaml')
];

export function parseConfig(raw: unknown): TariffGateConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }
  return result.data;
}

export function loadConfig(paths: string[] = CONFIG_PATHS): TariffGateConfig {
  for (const path of paths) {
    if (existsSync(path)) {
      const content = readFileSync(path, 'utf-8');
      let raw: unknown;
      try {
        raw = parseYaml(content);
      } catch (error) {
        throw new ConfigError(`Cannot parse ${path}`, { cause: error });
      }
      return parseConfig(raw);
    }
  }

  const config = parseConfig({});
  if (process.env.TARIFF_GATE_API_KEY) {
    config.auth.api_keys.push(process.env.TARIFF_GATE_API_KEY);
  }
  return config;
}

export function toGatePolicy(config: TariffGateConfig): GatePolicy {
  return { ...config.gates, contact_line: { ...config.gates.contact_line } };
}
