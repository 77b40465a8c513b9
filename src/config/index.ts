import { config as dotenvConfig } from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import YAML from 'yaml';
import { z } from 'zod';
import { BUNDLE_GROUP, BUNDLE_PLURAL, BUNDLE_VERSION } from '../apis/v1/bundle.js';

// Load environment variables
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
dotenvConfig({ path: join(__dirname, '../../.env') });

const booleanFlag = z
  .enum(['true', 'false', '1', '0', ''])
  .default('false')
  .transform((val) => val === 'true' || val === '1');

export const bundlePlanSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    free: z.boolean().optional(),
    parameters: z.array(z.record(z.unknown())).optional(),
  })
  .passthrough();

// Service bundle the operator provisions for every resource it watches
export const bundleSpecSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    image: z.string().min(1),
    runtime: z.number().int().positive().default(2),
    description: z.string().optional(),
    bindable: z.boolean().default(false),
    async: z.enum(['required', 'optional', 'unsupported']).default('optional'),
    plans: z.array(bundlePlanSchema).default([]),
  })
  .passthrough();

export type BundleSpec = z.infer<typeof bundleSpecSchema>;

const encodedBundleSpec = z
  .string()
  .optional()
  .transform((val, ctx): BundleSpec | undefined => {
    if (!val) return undefined;

    let document: unknown;
    try {
      document = YAML.parse(Buffer.from(val, 'base64').toString('utf8'));
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `not base64-encoded YAML: ${error instanceof Error ? error.message : String(error)}`,
      });
      return z.NEVER;
    }

    const parsed = bundleSpecSchema.safeParse(document);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message, path: issue.path });
      }
      return z.NEVER;
    }
    return parsed.data;
  });

// Define the configuration schema using Zod
const configSchema = z
  .object({
    // Watched custom resource
    resource: z.object({
      group: z.string().min(1).default(BUNDLE_GROUP),
      version: z.string().min(1).default(BUNDLE_VERSION),
      plural: z.string().min(1).default(BUNDLE_PLURAL),
      useStatusSubresource: booleanFlag,
    }),

    // Kubernetes Configuration
    kubernetes: z.object({
      kubeconfig: z.string().optional(),
      namespace: z.string().min(1).default('default'),
    }),

    // Bundle Configuration
    bundle: z.object({
      sandboxRole: z.string().min(1).default('edit'),
      planName: z.string().min(1).default('default'),
      pullPolicy: z.enum(['Always', 'IfNotPresent', 'Never']).default('Always'),
      spec: encodedBundleSpec,
    }),

    // Operator Configuration
    operator: z.object({
      logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      healthPort: z.coerce.number().int().positive().default(15080),
      statusFlushInterval: z.coerce.number().int().nonnegative().default(0),
      operationTimeout: z.coerce.number().int().nonnegative().default(0),
      conflictRetries: z.coerce.number().int().nonnegative().default(3),
      decommissionOnDelete: booleanFlag,
    }),

    executor: z.object({
      pollInterval: z.coerce.number().int().positive().default(2000),
    }),

    // Environment
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  })
  .transform((data) => ({
    ...data,
    isDevelopment: data.nodeEnv === 'development',
    isProduction: data.nodeEnv === 'production',
  }))
  .refine((data) => !data.isProduction || data.bundle.spec !== undefined, {
    message: 'BUNDLE_SPEC is required in production',
    path: ['bundle', 'spec'],
  });

// Infer the TypeScript type from the schema
export type Config = z.infer<typeof configSchema>;

// Parse and validate the configuration
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // Map environment variables to the schema structure
  const rawConfig = {
    resource: {
      group: env.RESOURCE_GROUP,
      version: env.RESOURCE_VERSION,
      plural: env.RESOURCE_PLURAL,
      useStatusSubresource: env.USE_STATUS_SUBRESOURCE,
    },
    kubernetes: {
      kubeconfig: env.KUBECONFIG || undefined,
      namespace: env.WATCH_NAMESPACE,
    },
    bundle: {
      sandboxRole: env.SANDBOX_ROLE,
      planName: env.BUNDLE_PLAN,
      pullPolicy: env.BUNDLE_PULL_POLICY,
      spec: env.BUNDLE_SPEC,
    },
    operator: {
      logLevel: env.LOG_LEVEL,
      healthPort: env.HEALTH_PORT,
      statusFlushInterval: env.STATUS_FLUSH_INTERVAL_MS,
      operationTimeout: env.OPERATION_TIMEOUT_MS,
      conflictRetries: env.CONFLICT_RETRIES,
      decommissionOnDelete: env.DECOMMISSION_ON_DELETE,
    },
    executor: {
      pollInterval: env.EXECUTOR_POLL_INTERVAL_MS,
    },
    nodeEnv: env.NODE_ENV,
  };

  const result = configSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new Error(
      `Invalid configuration: ${result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`,
    );
  }
  return result.data;
}

export const config = loadConfig();
