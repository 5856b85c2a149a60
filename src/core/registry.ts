import type { Capability, CapabilityHandler } from '../capabilities/handler.js';
import { CapabilityNotFoundError, RegistryError } from './errors.js';

/**
 * Maps intent names to capability handlers.
 *
 * Built once at startup, then sealed. A sealed registry is read-only and can
 * be shared by concurrent orchestration calls without locking.
 */
export class CapabilityRegistry {
  private readonly capabilities = new Map<string, Capability>();
  private sealed = false;

  constructor(readonly defaultIntent: string) {}

  register(capability: Capability): this {
    if (this.sealed) {
      throw new RegistryError(
        `Cannot register "${capability.intent}": registry is sealed`,
      );
    }
    // Planner intents are trimmed and lower-cased before lookup.
    const normalized = capability.intent.trim().toLowerCase();
    if (normalized.length === 0 || normalized !== capability.intent) {
      throw new RegistryError(
        `Intent "${capability.intent}" must be non-empty, trimmed and lower-case`,
      );
    }
    if (this.capabilities.has(capability.intent)) {
      throw new RegistryError(
        `Intent "${capability.intent}" is already registered`,
      );
    }
    this.capabilities.set(capability.intent, capability);
    return this;
  }

  /** Freeze the registry. Idempotent. */
  seal(): this {
    if (this.sealed) return this;
    if (!this.capabilities.has(this.defaultIntent)) {
      throw new RegistryError(
        `Default intent "${this.defaultIntent}" is not registered`,
      );
    }
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  has(intent: string): boolean {
    return this.capabilities.has(intent);
  }

  resolve(intent: string): CapabilityHandler {
    const capability = this.capabilities.get(intent);
    if (!capability) throw new CapabilityNotFoundError(intent);
    return capability.handler;
  }

  intents(): string[] {
    return [...this.capabilities.keys()];
  }

  list(): Capability[] {
    return [...this.capabilities.values()];
  }

  /** Human-readable enumeration of intents, passed verbatim to the planner. */
  describe(): string {
    const lines = ['Available intents:'];
    for (const c of this.capabilities.values()) {
      lines.push(`- ${c.intent}: ${c.description}`);
    }

    const examples = this.list().flatMap((c) =>
      c.examples.map((e) => `- "${e}" → ${c.intent}`),
    );
    if (examples.length > 0) {
      lines.push('', 'Examples:', ...examples);
    }

    lines.push('', `If unsure, use: ${this.defaultIntent}`);
    return lines.join('\n');
  }
}
