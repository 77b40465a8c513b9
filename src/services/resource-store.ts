import * as k8s from '@kubernetes/client-node';
import { ResourceDocument, decodeDocument } from '../apis/v1/bundle.js';
import {
  ConflictError,
  NotFoundError,
  ResourceIdentity,
  StoreError,
  errorStatusCode,
} from '../types/index.js';
import { Logger } from '../utils/logger.js';

/**
 * Backing store of watched resources. Documents travel as stored: only their
 * metadata is validated, so a read followed by a write leaves every other field
 * exactly as it was.
 */
export interface ResourceStore {
  get(identity: ResourceIdentity): Promise<ResourceDocument | null>;
  /**
   * Replaces the stored document. The document's `metadata.resourceVersion`
   * must match the stored one, otherwise a `ConflictError` is thrown.
   */
  update(document: ResourceDocument): Promise<ResourceDocument>;
}

export interface ResourceStoreOptions {
  group: string;
  version: string;
  plural: string;
  namespace: string;
  useStatusSubresource?: boolean;
}

export type CustomObjectsClient = Pick<
  k8s.CustomObjectsApi,
  'getNamespacedCustomObject' | 'replaceNamespacedCustomObject' | 'replaceNamespacedCustomObjectStatus'
>;

export class KubernetesResourceStore implements ResourceStore {
  constructor(
    private readonly customObjectsApi: CustomObjectsClient,
    private readonly options: ResourceStoreOptions,
    private readonly logger: Logger,
  ) {}

  async get(identity: ResourceIdentity): Promise<ResourceDocument | null> {
    const { group, version, plural } = this.options;
    const namespace = identity.namespace || this.options.namespace;

    let response: unknown;
    try {
      response = await this.customObjectsApi.getNamespacedCustomObject({
        group,
        version,
        namespace,
        plural,
        name: identity.name,
      });
    } catch (error) {
      const statusCode = errorStatusCode(error);
      if (statusCode === 404) {
        this.logger.debug(`Resource ${namespace}/${identity.name} not found`);
        return null;
      }
      throw new StoreError(`Failed to get ${plural} ${namespace}/${identity.name}`, statusCode, {
        cause: error,
      });
    }
    return decodeDocument(response);
  }

  async update(document: ResourceDocument): Promise<ResourceDocument> {
    const { group, version, plural, useStatusSubresource } = this.options;
    const identity = {
      namespace: document.metadata.namespace || this.options.namespace,
      name: document.metadata.name,
    };
    const request = {
      group,
      version,
      namespace: identity.namespace,
      plural,
      name: identity.name,
      body: document,
    };

    let response: unknown;
    try {
      response = useStatusSubresource
        ? await this.customObjectsApi.replaceNamespacedCustomObjectStatus(request)
        : await this.customObjectsApi.replaceNamespacedCustomObject(request);
    } catch (error) {
      const statusCode = errorStatusCode(error);
      if (statusCode === 409) {
        throw new ConflictError(identity, { cause: error });
      }
      if (statusCode === 404) {
        throw new NotFoundError(identity, { cause: error });
      }
      throw new StoreError(`Failed to update ${plural} ${identity.namespace}/${identity.name}`, statusCode, {
        cause: error,
      });
    }
    return decodeDocument(response);
  }
}
