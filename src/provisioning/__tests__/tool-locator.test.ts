import { describe, it, expect, beforeEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'fs';
import { delimiter, join } from 'path';
import { PathToolLocator } from '../tool-locator';
import { makeTempDir } from '../../__tests__/fakes';

describe('PathToolLocator', () => {
  let first: string;
  let second: string;

  beforeEach(() => {
    const root = makeTempDir('locator-');
    first = join(root, 'bin');
    second = join(root, 'usr-bin');
    mkdirSync(first);
    mkdirSync(second);
    writeFileSync(join(second, 'kubectl'), '#!/bin/sh\n', { mode: 0o755 });
    writeFileSync(join(first, 'kubectl'), '#!/bin/sh\n', { mode: 0o755 });
    writeFileSync(join(second, 'docker'), '#!/bin/sh\n', { mode: 0o755 });
    writeFileSync(join(first, 'minikube'), 'not executable', { mode: 0o644 });
    mkdirSync(join(first, 'netstat'));
  });

  it('should return the first match on the search path', () => {
    const locator = new PathToolLocator([first, second].join(delimiter));

    expect(locator.locate('kubectl')).toBe(join(first, 'kubectl'));
    expect(locator.locate('docker')).toBe(join(second, 'docker'));
  });

  it('should skip files that are not executable', () => {
    const locator = new PathToolLocator(first);

    expect(locator.locate('minikube')).toBeUndefined();
  });

  it('should skip directories named after the tool', () => {
    const locator = new PathToolLocator(first);

    expect(locator.locate('netstat')).toBeUndefined();
  });

  it('should find nothing without a search path', () => {
    expect(new PathToolLocator(undefined).locate('docker')).toBeUndefined();
    expect(new PathToolLocator(`${delimiter}${delimiter}`).locate('docker')).toBeUndefined();
  });
});
