import { RunLogger } from '../logging/run-logger';
import { describeFailure } from '../provisioning/command-runner';
import { ContainerInventory } from '../provisioning/types';
import { StageResult } from '../types';
import { fatal, ok } from './result';

export const EDGE_CONTAINER_STAGE = 'Edge container';

export class ContainerLocator {
  constructor(
    private readonly logger: RunLogger,
    private readonly containers: ContainerInventory
  ) {}

  async locateEdge(image: string): Promise<StageResult> {
    this.logger.section('Showing Running Containers');

    const table = await this.containers.containersTable();
    if (table.ok) {
      this.logger.info('Docker containers status:');
      this.logger.raw(table.stdout);
    } else {
      this.logger.warning(`Could not list containers: ${describeFailure(table)}`);
    }

    let containerId: string | undefined;
    try {
      containerId = await this.containers.findContainerByAncestor(image);
    } catch (error) {
      const message = `Could not look up the ${image} container: ${error instanceof Error ? error.message : String(error)}`;
      this.logger.error(message);
      return fatal(EDGE_CONTAINER_STAGE, message, 'transient');
    }

    if (!containerId) {
      const message = `No running container found for ${image}`;
      this.logger.error(message);
      return fatal(EDGE_CONTAINER_STAGE, message, 'structural', [image]);
    }

    this.logger.success(`Edge proxy container ID: ${containerId}`);
    return ok(EDGE_CONTAINER_STAGE, `Edge proxy container ID: ${containerId}`);
  }
}
