import { z } from 'zod';
import { DecodeError, ResourceIdentity } from '../../types/index.js';

export const BUNDLE_GROUP = 'automationbroker.io';
export const BUNDLE_VERSION = 'v1';
export const BUNDLE_PLURAL = 'bundles';
export const BUNDLE_KIND = 'Bundle';

// Bumped whenever the persisted status layout changes
export const STATUS_VERSION = 1;

export type BundleParameters = Record<string, unknown>;

// Opaque progress record emitted by the operation executor
export type ProgressMessage = Record<string, unknown>;

export const progressMessageSchema = z.record(z.unknown());

export const bundleStatusSchema = z
  .object({
    serviceInstanceID: z.string().uuid().optional(),
    parameterHash: z
      .string()
      .regex(/^[0-9a-f]{40}$/, 'expected a 40 character hex digest')
      .optional(),
    messages: z.array(progressMessageSchema).optional(),
    statusVersion: z.literal(STATUS_VERSION).optional(),
  })
  .passthrough();

export type BundleStatus = z.infer<typeof bundleStatusSchema>;

const metadataSchema = z
  .object({
    name: z.string().min(1),
    namespace: z.string().optional(),
    resourceVersion: z.string().optional(),
    generation: z.number().optional(),
    uid: z.string().optional(),
  })
  .passthrough();

const bundleSchema = z
  .object({
    apiVersion: z.string().default(`${BUNDLE_GROUP}/${BUNDLE_VERSION}`),
    kind: z.string().default(BUNDLE_KIND),
    metadata: metadataSchema,
    spec: z.record(z.unknown()).nullish().transform((val) => val ?? {}),
    status: bundleStatusSchema.nullish().transform((val) => val ?? {}),
  })
  .passthrough();

export type Bundle = z.infer<typeof bundleSchema>;

// Stored document as fetched: only metadata is checked, every other field keeps its stored value
const resourceDocumentSchema = z.object({ metadata: metadataSchema }).passthrough();

export type ResourceDocument = z.infer<typeof resourceDocumentSchema>;

const statusRecordSchema = z.record(z.unknown());

export function decodeBundle(obj: unknown): Bundle {
  const result = bundleSchema.safeParse(obj);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new DecodeError(`Malformed ${BUNDLE_KIND} resource: ${issues.join(', ')}`, issues);
  }
  return result.data;
}

export function decodeDocument(obj: unknown): ResourceDocument {
  const result = resourceDocumentSchema.safeParse(obj);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new DecodeError(`Malformed ${BUNDLE_KIND} document: ${issues.join(', ')}`, issues);
  }
  return result.data;
}

// Status of a stored document as a plain record; anything else reads as empty
export function statusOf(document: ResourceDocument): Record<string, unknown> {
  const result = statusRecordSchema.safeParse(document.status);
  return result.success ? result.data : {};
}

const looseMetadataSchema = z.object({
  metadata: z.object({
    name: z.string().optional(),
    namespace: z.string().optional(),
    resourceVersion: z.string().optional(),
  }),
});

export interface MetadataPeek {
  name?: string;
  namespace?: string;
  resourceVersion?: string;
}

// Best-effort identity of an object that may not decode
export function peekMetadata(obj: unknown): MetadataPeek {
  const result = looseMetadataSchema.safeParse(obj);
  return result.success ? result.data.metadata : {};
}

export function identityOf(bundle: Bundle, defaultNamespace: string): ResourceIdentity {
  return {
    namespace: bundle.metadata.namespace || defaultNamespace,
    name: bundle.metadata.name,
  };
}

export function resourceKey(identity: ResourceIdentity): string {
  return identity.namespace ? `${identity.namespace}/${identity.name}` : identity.name;
}
