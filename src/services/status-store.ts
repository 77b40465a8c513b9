import { BundleStatus, ResourceDocument, STATUS_VERSION, resourceKey, statusOf } from '../apis/v1/bundle.js';
import { ConflictError, NotFoundError, ResourceIdentity } from '../types/index.js';
import { Logger } from '../utils/logger.js';
import { ResourceStore } from './resource-store.js';

/**
 * Read-modify-write access to the status of a watched resource.
 *
 * Every write fetches the current document, overlays the given fields onto its
 * `status` and writes the document back, presenting the fetched
 * `resourceVersion`. Status fields not named in the overlay, spec, metadata
 * and any other field are written back exactly as fetched.
 */
export class StatusStore {
  constructor(
    private readonly store: ResourceStore,
    private readonly logger: Logger,
  ) {}

  async write(identity: ResourceIdentity, status: BundleStatus): Promise<ResourceDocument> {
    const current = await this.store.get(identity);
    if (!current) {
      throw new NotFoundError(identity);
    }

    this.logger.debug(`Writing status for ${resourceKey(identity)}`, {
      resourceVersion: current.metadata.resourceVersion,
      messages: status.messages?.length ?? 0,
    });

    return this.store.update({
      ...current,
      status: { ...statusOf(current), ...status, statusVersion: STATUS_VERSION },
    });
  }

  /**
   * Like `write`, but on a conflict re-reads the document and overlays the
   * fields again on top of the status as the other writer left it. The last
   * conflict propagates.
   */
  async writeWithRetry(identity: ResourceIdentity, status: BundleStatus, retries: number): Promise<ResourceDocument> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.write(identity, status);
      } catch (error) {
        if (!(error instanceof ConflictError) || attempt >= retries) {
          throw error;
        }
        this.logger.info(`Status write conflicted for ${resourceKey(identity)}, retrying`, {
          attempt: attempt + 1,
          retries,
        });
      }
    }
  }
}
