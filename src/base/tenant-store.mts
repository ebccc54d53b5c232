/**
 * Keyed state partitioned by tenant (Discord guild id).
 *
 * Every read and write names its tenant, so one guild's entries are never visible through another
 * guild's key even when the inner keys (user ids, channel ids) collide.
 */
export class TenantStore<V> {
  private readonly tenants = new Map<string, Map<string, V>>();

  get(tenant: string, key: string): V | undefined {
    return this.tenants.get(tenant)?.get(key);
  }

  set(tenant: string, key: string, value: V): void {
    let partition = this.tenants.get(tenant);
    if (!partition) {
      partition = new Map<string, V>();
      this.tenants.set(tenant, partition);
    }

    partition.set(key, value);
  }

  delete(tenant: string, key: string): boolean {
    const partition = this.tenants.get(tenant);
    if (!partition) {
      return false;
    }

    const deleted = partition.delete(key);
    if (partition.size === 0) {
      this.tenants.delete(tenant);
    }

    return deleted;
  }

  clear(): void {
    this.tenants.clear();
  }
}
