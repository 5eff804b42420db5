/**
 * One of several interchangeable ways to obtain a capability. `probe`
 * resolves undefined when the provider cannot serve on this host.
 */
export interface CapabilityProvider<T> {
  name: string;
  probe(): Promise<T | undefined>;
}

export interface ResolvedCapability<T> {
  provider: string;
  value: T;
}

/**
 * Tries providers in priority order and returns the first usable result.
 */
export async function firstAvailable<T>(
  providers: readonly CapabilityProvider<T>[]
): Promise<ResolvedCapability<T> | undefined> {
  for (const provider of providers) {
    const value = await provider.probe();
    if (value !== undefined) {
      return { provider: provider.name, value };
    }
  }
  return undefined;
}
