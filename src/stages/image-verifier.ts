import { RunLogger } from '../logging/run-logger';
import { describeFailure } from '../provisioning/command-runner';
import { ImageInventory } from '../provisioning/types';
import { StageResult } from '../types';
import { ok, warning } from './result';

export const IMAGE_VERIFY_STAGE = 'Image verification';

/**
 * Repository part of an image reference: `registry:5000/app:1.2` gives
 * `registry:5000/app`, a digest suffix is dropped.
 */
export function repositoryOf(reference: string): string {
  const withoutDigest = reference.split('@')[0];
  const colon = withoutDigest.lastIndexOf(':');
  return colon > withoutDigest.lastIndexOf('/') ? withoutDigest.slice(0, colon) : withoutDigest;
}

export interface ImageVerifierOptions {
  /** Tee the full `docker images` table into the log first */
  showInventory?: boolean;
}

/**
 * Confirms expected images are in the local store. Missing images only
 * warn: some are pulled at start-up rather than built.
 */
export class ImageVerifier {
  constructor(
    private readonly logger: RunLogger,
    private readonly inventory: ImageInventory,
    private readonly options: ImageVerifierOptions = {}
  ) {}

  async verifyPresence(expectedTags: string[]): Promise<StageResult> {
    this.logger.section('Validating Built Images');

    if (this.options.showInventory) {
      const table = await this.inventory.imagesTable();
      if (table.ok) {
        this.logger.info('Listing all Docker images:');
        this.logger.raw(table.stdout);
      } else {
        this.logger.warning(`Could not list Docker images: ${describeFailure(table)}`);
      }
    }

    let available: Set<string>;
    try {
      available = new Set((await this.inventory.listImages()).map(repositoryOf));
    } catch (error) {
      const message = `Could not read local image inventory: ${error instanceof Error ? error.message : String(error)}`;
      this.logger.warning(message);
      return warning(IMAGE_VERIFY_STAGE, message, 'advisory', [...expectedTags]);
    }

    const missing: string[] = [];
    for (const tag of expectedTags) {
      if (available.has(repositoryOf(tag))) {
        this.logger.success(`Image found: ${tag}`);
      } else {
        this.logger.warning(`Image not found: ${tag}`);
        missing.push(tag);
      }
    }

    if (missing.length > 0) {
      const message = `Some images may not be present: ${missing.join(' ')}`;
      this.logger.warning(message);
      return warning(IMAGE_VERIFY_STAGE, message, 'advisory', missing);
    }

    this.logger.success('All required images verified');
    return ok(IMAGE_VERIFY_STAGE, 'All required images verified');
  }
}
