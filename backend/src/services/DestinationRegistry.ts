import type { StageResult } from '../types/api.js';
import type { ServiceDescriptor, TransferConfig } from '../types/config.js';
import { ErrorHandler } from '../utils/errorHandler.js';

/**
 * Maps destination storage names to the transfer service that handles them.
 * Lookups are exact and case-sensitive.
 */
export class DestinationRegistry {
  private readonly descriptors: ReadonlyMap<string, ServiceDescriptor>;
  private readonly defaultDestination: string;

  constructor(config: Readonly<TransferConfig>) {
    const descriptors = new Map<string, ServiceDescriptor>();
    for (const [destination, serviceKey] of Object.entries(config.destinations)) {
      const service = config.services[serviceKey];
      if (service) {
        descriptors.set(
          destination,
          Object.freeze({
            serviceKey,
            name: service.name,
            url: service.url,
            kind: service.kind,
            timeout: service.timeout,
          })
        );
      }
    }

    this.descriptors = descriptors;
    this.defaultDestination = config.defaultDestination;
  }

  /**
   * Destination used when a request names none
   */
  getDefaultDestination(): string {
    return this.defaultDestination;
  }

  destinations(): string[] {
    return [...this.descriptors.keys()];
  }

  resolve(destination?: string): StageResult<ServiceDescriptor> {
    const key = destination || this.defaultDestination;
    const descriptor = this.descriptors.get(key);

    if (!descriptor) {
      return {
        success: false,
        fault: ErrorHandler.fault('invalidServiceConfig', `No transfer service configured for destination '${key}'`),
      };
    }

    return { success: true, value: descriptor };
  }
}
