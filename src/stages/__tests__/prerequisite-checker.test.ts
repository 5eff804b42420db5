import { describe, it, expect } from 'vitest';
import { PrerequisiteChecker } from '../prerequisite-checker';
import { createTestLogger, failedCommand, FakeLocator, FakePorts, FakeRunner } from '../../__tests__/fakes';

const AT = '[2024-01-02 03:04:05]';

describe('PrerequisiteChecker', () => {
  it('should pass when every tool resolves and every port is free', async () => {
    const log = createTestLogger();
    const checker = new PrerequisiteChecker(log.logger, new FakeLocator(['docker', 'docker-compose']), new FakePorts(), new FakeRunner());

    const result = await checker.validate(['docker', 'docker-compose'], [80, 3000]);

    expect(result).toEqual({ stage: 'Prerequisites', status: 'ok', message: 'All prerequisites validated successfully' });
    expect(log.lines()).toEqual([
      `${AT} [INFO] === Validating Prerequisites ===`,
      `${AT} [INFO] docker is installed: /usr/bin/docker`,
      `${AT} [INFO] docker version: docker version 1.0.0`,
      `${AT} [INFO] docker-compose is installed: /usr/bin/docker-compose`,
      `${AT} [INFO] docker-compose version: docker-compose version 1.0.0`,
      `${AT} [INFO] Checking required ports availability...`,
      `${AT} [INFO] Port 80 is available`,
      `${AT} [INFO] Port 3000 is available`,
      `${AT} [SUCCESS] All prerequisites validated successfully`
    ]);
  });

  it('should fail when a required port is bound', async () => {
    const log = createTestLogger();
    const checker = new PrerequisiteChecker(log.logger, new FakeLocator(['docker', 'docker-compose']), new FakePorts([3000]), new FakeRunner());

    const result = await checker.validate(['docker', 'docker-compose'], [80, 3000, 5000]);

    expect(result).toEqual({
      stage: 'Prerequisites',
      status: 'fatal',
      message: 'Prerequisites validation failed with 1 error(s)',
      kind: 'structural',
      missing: ['port 3000']
    });
    expect(log.lines()).toContain(`${AT} [WARNING] Port 3000 is already in use`);
  });

  it('should collect every missing tool and bound port', async () => {
    const log = createTestLogger();
    const runner = new FakeRunner();
    const checker = new PrerequisiteChecker(log.logger, new FakeLocator(['docker']), new FakePorts([80]), runner);

    const result = await checker.validate(['minikube', 'kubectl', 'docker'], [80]);

    expect(result.status).toBe('fatal');
    expect(result.missing).toEqual(['tool minikube', 'tool kubectl', 'port 80']);
    expect(result.message).toBe('Prerequisites validation failed with 3 error(s)');
    expect(log.lines()).toContain(`${AT} [ERROR] kubectl is not installed or not in PATH`);
    expect(runner.calls).toEqual([{ command: '/usr/bin/docker', args: ['--version'], options: { timeoutMs: 10000 } }]);
  });

  it('should only warn when no port listing tool is available', async () => {
    const log = createTestLogger();
    const checker = new PrerequisiteChecker(log.logger, new FakeLocator(['docker']), new FakePorts([80], null), new FakeRunner());

    const result = await checker.validate(['docker'], [80]);

    expect(result).toEqual({ stage: 'Prerequisites', status: 'ok', message: 'All prerequisites validated successfully' });
    expect(log.lines()).toContain(`${AT} [WARNING] Cannot check port availability (netstat/ss not available)`);
    expect(log.lines()).not.toContain(`${AT} [WARNING] Port 80 is already in use`);
  });

  it('should skip the port scan when no ports are required', async () => {
    const log = createTestLogger();
    const checker = new PrerequisiteChecker(log.logger, new FakeLocator(['docker']), new FakePorts([80]), new FakeRunner());

    expect((await checker.validate(['docker'], [])).status).toBe('ok');
    expect(log.lines()).not.toContain(`${AT} [INFO] Checking required ports availability...`);
  });

  it('should warn when a tool does not report its version', async () => {
    const log = createTestLogger();
    const runner = new FakeRunner(() => failedCommand('error: unknown command "version" for "kubectl"'));
    const checker = new PrerequisiteChecker(log.logger, new FakeLocator(['kubectl']), new FakePorts(), runner);

    const result = await checker.validate(['kubectl'], []);

    expect(result.status).toBe('ok');
    expect(log.lines()).toContain(`${AT} [WARNING] Could not read kubectl version`);
  });

  it('should ask each cluster tool for its version the way it expects', async () => {
    const log = createTestLogger();
    const runner = new FakeRunner();
    const checker = new PrerequisiteChecker(log.logger, new FakeLocator(['minikube', 'kubectl', 'docker']), new FakePorts(), runner);

    await checker.validate(['minikube', 'kubectl', 'docker'], []);

    expect(runner.calls.map(call => [call.command, ...call.args].join(' '))).toEqual([
      '/usr/bin/minikube version',
      '/usr/bin/kubectl version --client',
      '/usr/bin/docker --version'
    ]);
    expect(runner.calls.every(call => call.options?.timeoutMs === 10000)).toBe(true);
    expect(log.lines().filter(line => line.includes('[WARNING]'))).toEqual([]);
  });
});
