import { FtsTransferService } from '../adapters/FtsTransferService.js';
import type { TransferService } from '../adapters/TransferService.js';
import type { StageResult } from '../types/api.js';
import { ADAPTER_KINDS, type AdapterKind, type ServiceDescriptor } from '../types/config.js';
import { ErrorHandler } from '../utils/errorHandler.js';
import { ValidationService } from './ValidationService.js';

type AdapterConstructor = (descriptor: ServiceDescriptor) => TransferService;

const ADAPTERS: Record<AdapterKind, AdapterConstructor> = {
  fts: (descriptor) => new FtsTransferService(descriptor),
};

function isAdapterKind(kind: string): kind is AdapterKind {
  return ADAPTER_KINDS.some((known) => known === kind);
}

/**
 * Builds transfer service adapters from service descriptors.
 * Adapters are stateless, so one instance is shared by every descriptor
 * with the same kind, URL and timeout.
 */
export class ServiceFactory {
  private readonly adapters = new Map<string, TransferService>();

  getAdapter(descriptor: ServiceDescriptor): StageResult<TransferService> {
    const key = `${descriptor.kind}|${descriptor.url}|${descriptor.timeout}`;
    const cached = this.adapters.get(key);
    if (cached) {
      return { success: true, value: cached };
    }

    const kind = descriptor.kind;
    if (!isAdapterKind(kind)) {
      return {
        success: false,
        fault: ErrorHandler.fault(
          'invalidServiceConfig',
          `Unknown kind '${kind}' for transfer service '${descriptor.serviceKey}'`
        ),
      };
    }

    const urlValidation = ValidationService.validateServiceUrl(descriptor.url);
    if (!urlValidation.isValid) {
      return {
        success: false,
        fault: ErrorHandler.fault(
          'invalidServiceConfig',
          urlValidation.error || `Invalid URL for transfer service '${descriptor.serviceKey}'`
        ),
      };
    }

    const timeoutValidation = ValidationService.validateTimeout(descriptor.timeout);
    if (!timeoutValidation.isValid) {
      return {
        success: false,
        fault: ErrorHandler.fault(
          'invalidServiceConfig',
          timeoutValidation.error || `Invalid timeout for transfer service '${descriptor.serviceKey}'`
        ),
      };
    }

    const adapter = ADAPTERS[kind](descriptor);
    this.adapters.set(key, adapter);
    console.log(`Created ${kind} client for ${descriptor.name} at ${descriptor.url}`);

    return { success: true, value: adapter };
  }

  /**
   * Drops all cached adapters
   */
  clear(): void {
    this.adapters.clear();
  }
}
