/**
 * ATS client registry: maps each provider to its client implementation
 */

import type { AtsPostingsClient } from "@/interfaces";
import type { AtsProvider, ResolvedProvider } from "@/types";
import type { AtsClientConfig } from "./ats/baseAtsClient";
import { GreenhouseAtsClient } from "./greenhouse";
import { LeverAtsClient } from "./lever";
import { WorkableAtsClient } from "./workable";
import { SmartRecruitersAtsClient } from "./smartrecruiters";
import { AshbyAtsClient } from "./ashby";
import { WorkdayAtsClient } from "./workday";

export class AtsClientRegistry {
  private readonly clients = new Map<AtsProvider, AtsPostingsClient>();

  constructor(clients: AtsPostingsClient[] = []) {
    clients.forEach((client) => this.register(client));
  }

  /**
   * Register a client, replacing any previous client for the same provider
   */
  register(client: AtsPostingsClient): void {
    this.clients.set(client.provider, client);
  }

  /**
   * Client for a resolved provider; undefined for "unknown" or unregistered providers
   */
  get(provider: ResolvedProvider): AtsPostingsClient | undefined {
    if (provider === "unknown") {
      return undefined;
    }
    return this.clients.get(provider);
  }

  providers(): AtsProvider[] {
    return Array.from(this.clients.keys());
  }
}

/**
 * Registry with every supported provider, sharing one client configuration
 */
export function createAtsClientRegistry(config?: AtsClientConfig): AtsClientRegistry {
  return new AtsClientRegistry([
    new GreenhouseAtsClient(config),
    new LeverAtsClient(config),
    new WorkableAtsClient(config),
    new SmartRecruitersAtsClient(config),
    new AshbyAtsClient(config),
    new WorkdayAtsClient(config),
  ]);
}
