import { Endpoint, ResourceCategory, ResourceDef, ServiceSpec } from '../types';

/**
 * Services built from source. Each one has a `Dockerfile` in its context
 * directory and a deployment of the same name in the cluster.
 */
export const MANAGED_SERVICES: readonly ServiceSpec[] = [
  { name: 'backend', context: 'backend', image: 'backend:latest', port: 5000, autoscaled: true },
  { name: 'transactions', context: 'transactions', image: 'transactions:latest', port: 3000, autoscaled: true },
  { name: 'studentportfolio', context: 'studentportfolio', image: 'studentportfolio:latest' }
];

/** The edge proxy workload, routed to from outside the cluster */
export const EDGE_WORKLOAD = 'nginx';
export const EDGE_IMAGE = 'nginx:alpine';
export const STORAGE_IMAGE = 'mongo:6';

const CATEGORY_RANK: Record<ResourceCategory, number> = {
  secret: 0,
  config: 1,
  storage: 2,
  workload: 3,
  edge: 4
};

/**
 * Generates the fixed manifest order, endpoint list and workload names
 * for a set of managed services.
 */
export class ResourceCatalog {
  constructor(private readonly services: readonly ServiceSpec[] = MANAGED_SERVICES) {}

  listServices(): ServiceSpec[] {
    return this.services.map(service => ({ ...service }));
  }

  /**
   * Manifests in dependency order: the secret and config maps first, then
   * storage, then each service's deployment and service (and autoscaler,
   * when it has one), and the edge proxy last.
   */
  generateResourceOrder(): ResourceDef[] {
    const resources: ResourceDef[] = [
      { file: 'backend-secret.yaml', category: 'secret' },
      { file: `${EDGE_WORKLOAD}-configmap.yaml`, category: 'config' },
      { file: 'mongo-statefulset.yaml', category: 'storage' },
      { file: 'mongo-service.yaml', category: 'storage' }
    ];

    for (const service of this.services) {
      const suffixes = service.autoscaled ? ['deployment', 'service', 'hpa'] : ['deployment', 'service'];
      for (const suffix of suffixes) {
        resources.push({
          file: `${service.name}-${suffix}.yaml`,
          category: 'workload',
          service: service.name
        });
      }
    }

    resources.push(
      { file: `${EDGE_WORKLOAD}-deployment.yaml`, category: 'edge', service: EDGE_WORKLOAD },
      { file: `${EDGE_WORKLOAD}-service.yaml`, category: 'edge', service: EDGE_WORKLOAD }
    );

    return resources;
  }

  /**
   * Backing services with a port come first as advisory endpoints; the
   * edge proxy on the bare base URL is the only critical one.
   */
  generateEndpoints(baseUrl: string): Endpoint[] {
    const endpoints: Endpoint[] = this.services
      .filter((service): service is ServiceSpec & { port: number } => service.port !== undefined)
      .map(service => ({
        name: service.name,
        url: `${baseUrl}:${service.port}`,
        criticality: 'advisory' as const
      }));

    endpoints.push({ name: EDGE_WORKLOAD, url: baseUrl, criticality: 'critical' });
    return endpoints;
  }

  /** Deployments that get a rolling restart after images are rebuilt */
  generateWorkloadNames(): string[] {
    return [...this.services.map(service => service.name), EDGE_WORKLOAD];
  }

  /**
   * Images expected in the local store. The compose stack also pulls the
   * edge proxy and database images.
   */
  generateExpectedImages(includePulled: boolean): string[] {
    const built = this.services.map(service => service.image);
    return includePulled ? [...built, EDGE_IMAGE, STORAGE_IMAGE] : built;
  }
}

/**
 * Finds the first entry that would be applied before something it depends on.
 * @returns The offending entry, or undefined when the order is valid
 */
export function findOrderViolation(resources: readonly ResourceDef[]): ResourceDef | undefined {
  let highest = 0;
  for (const resource of resources) {
    const rank = CATEGORY_RANK[resource.category];
    if (rank < highest) {
      return resource;
    }
    highest = rank;
  }
  return undefined;
}

export function createResourceCatalog(services?: readonly ServiceSpec[]): ResourceCatalog {
  return new ResourceCatalog(services);
}
