import { writeFileSync } from 'fs';
import { RunLogger } from '../logging/run-logger';
import { describeFailure } from '../provisioning/command-runner';
import { ImageInventory } from '../provisioning/types';
import { StageResult } from '../types';
import { ok, warning } from './result';

export const IMAGE_AUDIT_STAGE = 'Image audit';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function render(value: unknown): string {
  if (value === undefined) {
    return 'null';
  }
  return typeof value === 'string' ? value : JSON.stringify(value, null, 2);
}

/**
 * Saves the raw `docker inspect` output of one image and logs the fields
 * that matter when debugging a deployment.
 */
export class ImageAuditor {
  constructor(
    private readonly logger: RunLogger,
    private readonly inventory: ImageInventory,
    private readonly auditFile: string
  ) {}

  async inspect(image: string): Promise<StageResult> {
    this.logger.section(`Inspecting ${image} Image`);

    const result = await this.inventory.inspectImage(image);
    try {
      writeFileSync(this.auditFile, result.stdout || result.stderr);
    } catch (error) {
      const message = `Could not write ${this.auditFile}: ${error instanceof Error ? error.message : String(error)}`;
      this.logger.warning(message);
      return warning(IMAGE_AUDIT_STAGE, message, 'advisory', [image]);
    }

    if (!result.ok) {
      const message = `Failed to inspect ${image}: ${describeFailure(result)}`;
      this.logger.warning(message);
      return warning(IMAGE_AUDIT_STAGE, message, 'advisory', [image]);
    }
    this.logger.success(`Docker inspect output saved to: ${this.auditFile}`);

    let entries: unknown;
    try {
      entries = JSON.parse(result.stdout);
    } catch (error) {
      const message = `Inspect output for ${image} is not JSON: ${error instanceof Error ? error.message : String(error)}`;
      this.logger.warning(message);
      return warning(IMAGE_AUDIT_STAGE, message, 'advisory', [image]);
    }

    const first = Array.isArray(entries) ? entries[0] : undefined;
    if (!isRecord(first)) {
      const message = `Inspect output for ${image} has no entries`;
      this.logger.warning(message);
      return warning(IMAGE_AUDIT_STAGE, message, 'advisory', [image]);
    }

    const config = isRecord(first.Config) ? first.Config : undefined;
    const fields: Array<[string, unknown]> = [
      ['RepoTags', Array.isArray(first.RepoTags) ? first.RepoTags.join('\n') : first.RepoTags],
      ['Created', first.Created],
      ['Os', first.Os],
      ['Config', first.Config],
      ['ExposedPorts', config?.ExposedPorts]
    ];

    this.logger.info(`=== Extracting Key Information from ${image} ===`);
    for (const [field, value] of fields) {
      this.logger.info(`=== ${field} ===`);
      this.logger.raw(render(value));
    }

    return ok(IMAGE_AUDIT_STAGE, `Inspect output saved to ${this.auditFile}`);
  }
}
