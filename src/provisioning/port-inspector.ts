import { CapabilityProvider, firstAvailable } from '../utils/capabilities';
import { CommandRunner, PortInspector, PortScan, ToolLocator } from './types';

export interface SocketTableSource {
  name: string;
  args: string[];
}

/** Listing tools tried in order; each prints listening TCP/UDP sockets numerically */
export const SOCKET_TABLE_SOURCES: readonly SocketTableSource[] = [
  { name: 'netstat', args: ['-tuln'] },
  { name: 'ss', args: ['-tuln'] }
];

export function isPortListed(socketTable: string, port: number): boolean {
  const pattern = new RegExp(`:${port}\\s`);
  return socketTable.split('\n').some(line => pattern.test(`${line} `));
}

/**
 * Reads the local socket table with the first listing tool available.
 */
export class SocketTablePortInspector implements PortInspector {
  constructor(
    private readonly runner: CommandRunner,
    private readonly locator: ToolLocator,
    private readonly sources: readonly SocketTableSource[] = SOCKET_TABLE_SOURCES
  ) {}

  async scan(ports: number[]): Promise<PortScan> {
    const table = await firstAvailable(this.sources.map(source => this.provider(source)));
    if (!table) {
      return { bound: [] };
    }

    return {
      provider: table.provider,
      bound: ports.filter(port => isPortListed(table.value, port))
    };
  }

  private provider(source: SocketTableSource): CapabilityProvider<string> {
    return {
      name: source.name,
      probe: async () => {
        const executable = this.locator.locate(source.name);
        if (!executable) {
          return undefined;
        }
        const result = await this.runner.run(executable, source.args);
        return result.ok ? result.stdout : undefined;
      }
    };
  }
}
