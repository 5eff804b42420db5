import { accessSync, constants, statSync } from 'fs';
import { delimiter, join } from 'path';
import { ToolLocator } from './types';

/**
 * Resolves executables the way a shell does: the first regular, executable
 * file named after the tool in any search path entry.
 */
export class PathToolLocator implements ToolLocator {
  private readonly directories: string[];

  constructor(searchPath: string | undefined) {
    this.directories = (searchPath ?? '')
      .split(delimiter)
      .map(segment => segment.trim())
      .filter(Boolean);
  }

  locate(tool: string): string | undefined {
    for (const directory of this.directories) {
      const candidate = join(directory, tool);
      if (isExecutableFile(candidate)) {
        return candidate;
      }
    }
    return undefined;
  }
}

function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) {
      return false;
    }
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
