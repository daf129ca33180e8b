export const ADAPTER_KINDS = ['fts'] as const;

export type AdapterKind = (typeof ADAPTER_KINDS)[number];

export interface ServiceConfig {
  name: string;
  url: string;
  kind: string;
  timeout: number; // milliseconds
}

/**
 * Shape of the transfer configuration document
 */
export interface TransferConfig {
  defaultDestination: string;
  destinations: Record<string, string>;
  services: Record<string, ServiceConfig>;
}

export interface ServiceDescriptor {
  serviceKey: string;
  name: string;
  url: string;
  kind: string;
  timeout: number;
}
