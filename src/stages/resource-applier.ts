import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { loadAll } from 'js-yaml';
import { findOrderViolation } from '../config/catalog';
import { RunLogger } from '../logging/run-logger';
import { describeFailure } from '../provisioning/command-runner';
import { ControlPlane } from '../provisioning/types';
import { ResourceDef, StageResult } from '../types';
import { fatal, ok } from './result';

export const RESOURCE_APPLY_STAGE = 'Resource apply';

export interface ManifestDocument {
  kind: string;
  name: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses a manifest file and returns the identity of every document in it.
 * @throws Error when the YAML is malformed or a document has no kind or name
 */
export function readManifestDocuments(content: string): ManifestDocument[] {
  const documents = loadAll(content).filter(document => document !== null && document !== undefined);
  if (documents.length === 0) {
    throw new Error('no resource documents found');
  }

  return documents.map((document, index) => {
    const metadata = isRecord(document) ? document.metadata : undefined;
    const kind = isRecord(document) ? document.kind : undefined;
    const name = isRecord(metadata) ? metadata.name : undefined;

    if (typeof kind !== 'string' || typeof name !== 'string') {
      throw new Error(`document ${index + 1} is missing kind or metadata.name`);
    }
    return { kind, name };
  });
}

/**
 * Applies the fixed manifest sequence one file at a time. Absent files are
 * skipped; anything the control plane rejects stops the stage.
 */
export class ResourceApplier {
  constructor(
    private readonly logger: RunLogger,
    private readonly controlPlane: ControlPlane,
    private readonly manifestDir: string
  ) {}

  async applyAll(ordered: ResourceDef[]): Promise<StageResult> {
    this.logger.section('Applying Kubernetes Manifests');

    const violation = findOrderViolation(ordered);
    if (violation) {
      const message = `${violation.file} (${violation.category}) is ordered after resources that depend on it`;
      this.logger.error(message);
      return fatal(RESOURCE_APPLY_STAGE, message, 'structural', [violation.file]);
    }

    if (!existsSync(this.manifestDir)) {
      const message = `Kubernetes manifests directory not found: ${this.manifestDir}`;
      this.logger.error(message);
      return fatal(RESOURCE_APPLY_STAGE, message, 'structural');
    }

    this.logger.info(`Applying manifests from ${this.manifestDir}...`);
    const skipped: string[] = [];
    let applied = 0;

    for (const resource of ordered) {
      const path = join(this.manifestDir, resource.file);
      if (!existsSync(path)) {
        this.logger.info(`Skipping ${resource.file} (not present)`);
        skipped.push(resource.file);
        continue;
      }

      const content = readFileSync(path, 'utf-8');
      let documents: ManifestDocument[];
      try {
        documents = readManifestDocuments(content);
      } catch (error) {
        const message = `Malformed resource definition ${resource.file}: ${error instanceof Error ? error.message : String(error)}`;
        this.logger.error(message);
        return fatal(RESOURCE_APPLY_STAGE, message, 'structural', [resource.file]);
      }

      const identities = documents.map(document => `${document.kind}/${document.name}`).join(', ');
      this.logger.info(`Applying ${resource.file} (${identities})...`);

      const result = await this.controlPlane.apply(content);
      if (!result.ok) {
        const message = `Failed to apply ${resource.file}: ${describeFailure(result)}`;
        this.logger.error(message);
        return fatal(RESOURCE_APPLY_STAGE, message, 'structural', [resource.file]);
      }

      for (const line of result.stdout.split('\n').map(entry => entry.trim()).filter(Boolean)) {
        this.logger.info(line);
      }
      applied++;
    }

    const message = skipped.length > 0
      ? `Applied ${applied} manifest(s), skipped ${skipped.length} absent file(s)`
      : `Applied ${applied} manifest(s)`;
    this.logger.success('All manifests applied successfully');
    return ok(RESOURCE_APPLY_STAGE, message, skipped);
  }
}
