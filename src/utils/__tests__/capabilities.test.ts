import { describe, it, expect, vi } from 'vitest';
import { CapabilityProvider, firstAvailable } from '../capabilities';

const provider = (name: string, value: string | undefined): CapabilityProvider<string> => ({
  name,
  probe: vi.fn(async () => value)
});

describe('firstAvailable', () => {
  it('should return the first provider that yields a value', async () => {
    const providers = [provider('netstat', undefined), provider('ss', 'table'), provider('lsof', 'other')];

    expect(await firstAvailable(providers)).toEqual({ provider: 'ss', value: 'table' });
    expect(providers[2].probe).not.toHaveBeenCalled();
  });

  it('should accept an empty value as usable', async () => {
    expect(await firstAvailable([provider('netstat', '')])).toEqual({ provider: 'netstat', value: '' });
  });

  it('should return undefined when no provider can serve', async () => {
    expect(await firstAvailable([provider('netstat', undefined)])).toBeUndefined();
    expect(await firstAvailable<string>([])).toBeUndefined();
  });
});
