import type { ParseResult, ValidationResult } from '../types/validation.js';
import type { ServiceConfig, TransferConfig } from '../types/config.js';
import type { Transfer } from '../types/transfer.js';

export const DEFAULT_LIMIT = 100;
export const MAX_LIMIT = 10000;

const CHECKSUM_MODES = ['source', 'target', 'both', 'none'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isOptional(value: unknown, type: 'string' | 'number' | 'boolean'): boolean {
  return value === undefined || typeof value === type;
}

export class ValidationService {
  /**
   * Sanitizes user input by removing control characters and surrounding
   * whitespace
   */
  static sanitizeInput(input: string | null | undefined): string {
    if (!input) {
      return '';
    }

    // Trim whitespace
    let sanitized = input.trim();

    // Remove null bytes and control characters
    sanitized = sanitized.replace(/[\x00-\x08\x0B-\x0C\x0E-\x1F\x7F]/g, '');

    if (sanitized.length > 2048) {
      sanitized = sanitized.substring(0, 2048);
    }

    return sanitized;
  }

  /**
   * Validates that a service URL is absolute and uses HTTP(S)
   */
  static validateServiceUrl(url: string): ValidationResult {
    try {
      const urlObj = new URL(url);
      if (urlObj.protocol !== 'https:' && urlObj.protocol !== 'http:') {
        return {
          isValid: false,
          error: `Service URL must use HTTP or HTTPS protocol: ${url}`,
        };
      }
      return { isValid: true };
    } catch (error) {
      return {
        isValid: false,
        error: `Invalid service URL: ${url}`,
      };
    }
  }

  static validateTimeout(timeout: unknown): ValidationResult {
    if (typeof timeout !== 'number' || !Number.isInteger(timeout) || timeout <= 0) {
      return {
        isValid: false,
        error: 'Timeout must be a positive number of milliseconds',
      };
    }
    return { isValid: true };
  }

  /**
   * Validates the transfer configuration document and narrows it.
   *
   * Only structure is checked here. Adapter kinds and URL syntax are checked
   * by the service factory when a request selects the service.
   */
  static validateConfig(value: unknown): ParseResult<TransferConfig> {
    if (!isRecord(value)) {
      return { isValid: false, error: 'Configuration must be an object' };
    }

    const { defaultDestination, destinations, services } = value;

    if (typeof defaultDestination !== 'string' || defaultDestination.length === 0) {
      return { isValid: false, error: 'defaultDestination must be a non-empty string' };
    }

    if (!isRecord(services)) {
      return { isValid: false, error: 'services must be an object' };
    }

    const serviceConfigs: Record<string, ServiceConfig> = {};
    for (const [serviceKey, service] of Object.entries(services)) {
      if (!isRecord(service)) {
        return { isValid: false, error: `Service '${serviceKey}' must be an object` };
      }

      const { name, url, kind, timeout } = service;
      if (typeof name !== 'string' || typeof url !== 'string' || typeof kind !== 'string') {
        return {
          isValid: false,
          error: `Service '${serviceKey}' requires string name, url and kind`,
        };
      }

      const timeoutResult = this.validateTimeout(timeout);
      if (!timeoutResult.isValid || typeof timeout !== 'number') {
        return { isValid: false, error: `Service '${serviceKey}': ${timeoutResult.error}` };
      }

      serviceConfigs[serviceKey] = { name, url, kind, timeout };
    }

    if (!isRecord(destinations)) {
      return { isValid: false, error: 'destinations must be an object' };
    }

    const destinationMap: Record<string, string> = {};
    for (const [destination, serviceKey] of Object.entries(destinations)) {
      if (typeof serviceKey !== 'string') {
        return { isValid: false, error: `Destination '${destination}' must name a service` };
      }
      if (!Object.hasOwn(serviceConfigs, serviceKey)) {
        return {
          isValid: false,
          error: `Destination '${destination}' references unknown service '${serviceKey}'`,
        };
      }
      destinationMap[destination] = serviceKey;
    }

    return {
      isValid: true,
      value: {
        defaultDestination,
        destinations: destinationMap,
        services: serviceConfigs,
      },
    };
  }

  /**
   * Validates the structure of a transfer request body.
   * Content (URIs, checksums) is left for the transfer service to judge.
   */
  static validateTransfer(value: unknown): ValidationResult {
    if (!isRecord(value)) {
      return { isValid: false, error: 'Transfer must be an object' };
    }

    const { files, params } = value;
    if (!Array.isArray(files) || files.length === 0) {
      return { isValid: false, error: 'Transfer must contain at least one file' };
    }

    for (const [index, file] of files.entries()) {
      if (!isRecord(file)) {
        return { isValid: false, error: `File ${index} must be an object` };
      }
      if (!isStringArray(file.sources) || file.sources.length === 0) {
        return { isValid: false, error: `File ${index} must have at least one source` };
      }
      if (!isStringArray(file.destinations) || file.destinations.length === 0) {
        return { isValid: false, error: `File ${index} must have at least one destination` };
      }
      if (
        !isOptional(file.checksum, 'string') ||
        !isOptional(file.filesize, 'number') ||
        !isOptional(file.metadata, 'string') ||
        !isOptional(file.activity, 'string')
      ) {
        return { isValid: false, error: `File ${index} has fields of the wrong type` };
      }
    }

    if (params === undefined) {
      return { isValid: true };
    }
    if (!isRecord(params)) {
      return { isValid: false, error: 'Transfer params must be an object' };
    }

    const { verifyChecksum, priority, jobMetadata } = params;
    if (
      verifyChecksum !== undefined &&
      typeof verifyChecksum !== 'boolean' &&
      !(typeof verifyChecksum === 'string' && CHECKSUM_MODES.includes(verifyChecksum))
    ) {
      return {
        isValid: false,
        error: `verifyChecksum must be a boolean or one of ${CHECKSUM_MODES.join(', ')}`,
      };
    }

    if (
      priority !== undefined &&
      (typeof priority !== 'number' || !Number.isInteger(priority) || priority < 1 || priority > 5)
    ) {
      return { isValid: false, error: 'priority must be an integer between 1 and 5' };
    }

    if (jobMetadata !== undefined && !isRecord(jobMetadata)) {
      return { isValid: false, error: 'jobMetadata must be an object' };
    }

    if (
      !isOptional(params.overwrite, 'boolean') ||
      !isOptional(params.retry, 'number') ||
      !isOptional(params.retryDelay, 'number') ||
      !isOptional(params.maxTimeInQueue, 'number') ||
      !isOptional(params.strictCopy, 'boolean') ||
      !isOptional(params.reuse, 'boolean')
    ) {
      return { isValid: false, error: 'Transfer params have fields of the wrong type' };
    }

    return { isValid: true };
  }

  static isTransfer(value: unknown): value is Transfer {
    return this.validateTransfer(value).isValid;
  }

  /**
   * Parses the limit query parameter, falling back to the default page size
   */
  static parseLimit(raw: string | undefined): ParseResult<number> {
    const sanitized = this.sanitizeInput(raw);
    if (!sanitized) {
      return { isValid: true, value: DEFAULT_LIMIT };
    }

    if (!/^\d+$/.test(sanitized)) {
      return { isValid: false, error: 'limit must be a positive integer' };
    }

    const limit = parseInt(sanitized, 10);
    if (limit < 1 || limit > MAX_LIMIT) {
      return { isValid: false, error: `limit must be between 1 and ${MAX_LIMIT}` };
    }

    return { isValid: true, value: limit };
  }

  /**
   * Validates a time window given as 'hours[:minutes]'
   */
  static validateTimeWindow(timeWindow: string): ValidationResult {
    const match = /^(\d+)(?::(\d{1,2}))?$/.exec(timeWindow);
    if (!match) {
      return { isValid: false, error: "time_window must have the form 'hours[:minutes]'" };
    }

    if (match[2] !== undefined && parseInt(match[2], 10) > 59) {
      return { isValid: false, error: 'time_window minutes must be between 0 and 59' };
    }

    return { isValid: true };
  }

  /**
   * Validates a path segment such as a job ID or field name
   */
  static validatePathSegment(name: string, value: string): ValidationResult {
    if (!value) {
      return { isValid: false, error: `${name} is required` };
    }

    if (value.includes('/')) {
      return { isValid: false, error: `${name} must not contain '/'` };
    }

    return { isValid: true };
  }
}
