import type { VkId } from "../types/brands";

/** Read-only source of serialized verification keys. */
export interface VerificationKeyStore {
  get: (id: VkId) => Promise<Uint8Array | undefined>;
}

export class MemoryVkStore implements VerificationKeyStore {
  private keys = new Map<VkId, Uint8Array>();

  set(id: VkId, bytes: Uint8Array): this {
    this.keys.set(id, Uint8Array.from(bytes));
    return this;
  }

  async get(id: VkId): Promise<Uint8Array | undefined> {
    const bytes = this.keys.get(id);
    return bytes && Uint8Array.from(bytes);
  }
}
