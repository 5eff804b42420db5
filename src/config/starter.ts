import { stringify } from 'yaml';
import { defaultTunables, ENVIRONMENT_OVERRIDES } from './loader';

/**
 * Starter config file with every tunable at its default value. Each value
 * can still be overridden from the environment.
 */
export function renderStarterConfig(generatedAt: Date = new Date()): string {
  const overrides = Object.entries(ENVIRONMENT_OVERRIDES)
    .map(([variable, path]) => `#   ${variable.padEnd(22)} ${path}`)
    .join('\n');

  return [
    '# Deployment orchestrator configuration',
    `# Generated on ${generatedAt.toISOString()}`,
    '#',
    '# Environment variables take precedence over this file:',
    overrides,
    '# Values may reference the environment as ${VAR} or ${VAR:-default}.',
    '',
    stringify(defaultTunables())
  ].join('\n');
}
