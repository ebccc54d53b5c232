import type { RegistrationLookup } from "../types.mjs";

export class FakeRegistrationLookup implements RegistrationLookup {
  private readonly registered = new Set<string>();

  isRegistered(tenant: string, userId: string): boolean {
    return this.registered.has(`${tenant}:${userId}`);
  }

  register(tenant: string, ...userIds: string[]): this {
    for (const userId of userIds) {
      this.registered.add(`${tenant}:${userId}`);
    }
    return this;
  }

  unregister(tenant: string, userId: string): void {
    this.registered.delete(`${tenant}:${userId}`);
  }
}

export function aFakeRegistrationLookupWith(registrations: Record<string, string[]> = {}): FakeRegistrationLookup {
  const lookup = new FakeRegistrationLookup();
  for (const [tenant, userIds] of Object.entries(registrations)) {
    lookup.register(tenant, ...userIds);
  }
  return lookup;
}
