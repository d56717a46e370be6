import { ServiceError } from "./errors";
import type { AsrModule } from "./modules/asr/types";
import type { SummaryModule } from "./modules/summary/types";
import type { ReadyStatus } from "./modules/transcode/types";
import { errMessage, log } from "./util/log";

export type ServiceCategory = "asr" | "summary";

export type ServiceDescriptor = {
  name: string;
  category: ServiceCategory;
  available: boolean;
  details?: Record<string, unknown>;
};

interface Probeable {
  ready(): Promise<ReadyStatus>;
}

type Entry<S> = {
  factory: () => S;
  instance?: S;
};

/**
 * Name → factory table for one service category. A second registration under
 * an existing name is rejected; instances are built on first lookup and kept.
 */
export class ServiceTable<S extends Probeable> {
  private readonly entries = new Map<string, Entry<S>>();
  private sealed = false;

  constructor(readonly category: ServiceCategory) {}

  register(name: string, factory: () => S): void {
    if (this.sealed) {
      throw new ServiceError("Conflict", `registry is sealed; cannot register ${this.category} service "${name}"`);
    }
    if (this.entries.has(name)) {
      throw new ServiceError("Conflict", `${this.category} service "${name}" is already registered`);
    }
    this.entries.set(name, { factory });
    log.info("service registered", { category: this.category, name });
  }

  seal(): void {
    this.sealed = true;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /** Registered names in registration order. */
  names(): string[] {
    return [...this.entries.keys()];
  }

  resolve(name: string): S {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new ServiceError("NotFound", `unknown ${this.category} service "${name}"`, {
        details: { registered: this.names() },
      });
    }
    if (!entry.instance) {
      entry.instance = entry.factory();
      log.debug("service constructed", { category: this.category, name });
    }
    return entry.instance;
  }

  /**
   * Probes every registered service. Probes run side by side and a failing or
   * throwing one only marks its own service unavailable.
   */
  async available(): Promise<ServiceDescriptor[]> {
    return await Promise.all(
      this.names().map(async (name): Promise<ServiceDescriptor> => {
        let status: ReadyStatus;
        try {
          status = await this.resolve(name).ready();
        } catch (e) {
          status = { ok: false, details: { error: errMessage(e) } };
        }
        if (!status.ok) log.warn("service probe failed", { category: this.category, name, details: status.details });
        return { name, category: this.category, available: status.ok, details: status.details };
      }),
    );
  }
}

/** Process-wide registry. Populated once at startup, then sealed and only read. */
export class ServiceRegistry {
  readonly asr = new ServiceTable<AsrModule>("asr");
  readonly summary = new ServiceTable<SummaryModule>("summary");

  seal(): void {
    this.asr.seal();
    this.summary.seal();
  }
}
