import fs from 'fs';
import path from 'path';
import { z } from 'zod';

const MiB = 1024 * 1024;

export const SandboxConfigSchema = z.object({
  execution: z
    .object({
      timeoutMs: z.number().int().positive().default(5000),
      graceMs: z.number().int().nonnegative().default(250),
    })
    .default({}),
  script: z
    .object({
      // isolated-vm refuses isolates below 8 MB
      memoryLimitMb: z.number().int().min(8).default(128),
    })
    .default({}),
  module: z
    .object({
      entryPoint: z.string().min(1).default('_start'),
      maxMemoryBytes: z
        .number()
        .int()
        .positive()
        .default(64 * MiB),
      workerHeapMb: z.number().int().positive().default(64),
    })
    .default({}),
  capture: z
    .object({
      maxStdoutBytes: z.number().int().nonnegative().default(MiB),
      maxStderrBytes: z.number().int().nonnegative().default(MiB),
    })
    .default({}),
  fetch: z
    .object({
      allowedDomains: z.array(z.string().min(1)).default([]),
      allowPrivateNetwork: z.boolean().default(false),
      maxRequestBodyBytes: z.number().int().nonnegative().default(MiB),
      maxResponseBodyBytes: z.number().int().nonnegative().default(MiB),
      timeoutMs: z.number().int().positive().default(5000),
    })
    .default({}),
  download: z
    .object({
      maxBytes: z
        .number()
        .int()
        .positive()
        .default(10 * MiB),
      timeoutMs: z.number().int().positive().default(10000),
    })
    .default({}),
});

export type SandboxConfig = z.infer<typeof SandboxConfigSchema>;
export type SandboxConfigInput = z.input<typeof SandboxConfigSchema>;
export type FetchPolicyConfig = SandboxConfig['fetch'];

export const CONFIG_ENV_VAR = 'SANDBOX_EXEC_CONFIG';
const CONFIG_FILES = ['sandbox-exec.config.json'];

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Parse raw configuration into a frozen, fully defaulted config.
 */
export function parseSandboxConfig(raw: unknown): SandboxConfig {
  return deepFreeze(SandboxConfigSchema.parse(raw));
}

/**
 * Load configuration once at startup. The file named by SANDBOX_EXEC_CONFIG wins
 * over `sandbox-exec.config.json` in the working directory.
 */
export function loadSandboxConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): SandboxConfig {
  const explicit = env[CONFIG_ENV_VAR];
  const candidates = explicit ? [explicit] : CONFIG_FILES;

  for (const file of candidates) {
    const configPath = path.resolve(cwd, file);
    if (fs.existsSync(configPath)) {
      try {
        const content = fs.readFileSync(configPath, 'utf-8');
        return parseSandboxConfig(JSON.parse(content));
      } catch (error) {
        console.warn(`Failed to load config from ${file}:`, error);
      }
    }
  }

  // Return defaults if no config found
  return parseSandboxConfig({});
}
