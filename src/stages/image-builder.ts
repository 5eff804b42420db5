import { existsSync } from 'fs';
import { join, resolve } from 'path';
import { RunLogger } from '../logging/run-logger';
import { describeFailure } from '../provisioning/command-runner';
import { ContainerBuilder } from '../provisioning/types';
import { ServiceSpec, StageResult } from '../types';
import { fatal, ok } from './result';

export const IMAGE_BUILD_STAGE = 'Image build';
export const BUILD_DESCRIPTOR = 'Dockerfile';

/**
 * Builds one image per service, in order, stopping at the first failure.
 */
export class ImageBuilder {
  constructor(
    private readonly logger: RunLogger,
    private readonly builder: ContainerBuilder,
    private readonly workDir: string
  ) {}

  async buildAll(services: ServiceSpec[]): Promise<StageResult> {
    this.logger.section('Building Docker Images');

    for (const service of services) {
      const context = resolve(this.workDir, service.context);
      const descriptor = join(context, BUILD_DESCRIPTOR);

      this.logger.info(`Building ${service.image} from ${context}...`);

      if (!existsSync(descriptor)) {
        const message = `${BUILD_DESCRIPTOR} not found: ${descriptor}`;
        this.logger.error(message);
        return fatal(IMAGE_BUILD_STAGE, message, 'structural', [service.name]);
      }

      const result = await this.builder.build(context, service.image);
      if (!result.ok) {
        const message = `Failed to build ${service.image}: ${describeFailure(result)}`;
        this.logger.error(message);
        return fatal(IMAGE_BUILD_STAGE, message, 'structural', [service.name]);
      }

      this.logger.success(`Successfully built ${service.image}`);
    }

    this.logger.success('All images built successfully');
    return ok(IMAGE_BUILD_STAGE, `Built ${services.length} image(s)`);
  }
}
