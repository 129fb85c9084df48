import type { DebugBlock, DebugFile, DebugFileType } from './types.js';

function parseDebugBlock(details: Record<string, unknown> | undefined): DebugBlock | undefined {
  const debug = details?.debug;
  if (!debug || typeof debug !== 'object' || Array.isArray(debug)) return undefined;
  if (!('debug_id' in debug) || typeof debug.debug_id !== 'string') return undefined;
  if (!('debug_url' in debug) || typeof debug.debug_url !== 'string') return undefined;
  const files = 'files' in debug && Array.isArray(debug.files) ? debug.files : [];
  return {
    debug_id: debug.debug_id,
    debug_url: debug.debug_url,
    files: files.flatMap((file: unknown): DebugFile[] => {
      if (!file || typeof file !== 'object') return [];
      if (!('name' in file) || typeof file.name !== 'string') return [];
      if (!('url' in file) || typeof file.url !== 'string') return [];
      const type: DebugFileType = 'type' in file && (file.type === 'image' || file.type === 'html') ? file.type : 'other';
      const size = 'size' in file && typeof file.size === 'number' ? file.size : 0;
      return [{ name: file.name, url: file.url, type, size }];
    }),
  };
}

export class PortalRelayError extends Error {
  /** Diagnostics captured by the service when a job failed. */
  public readonly debug?: DebugBlock;

  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: Record<string, unknown>,
    public readonly raw?: unknown,
  ) {
    super(message);
    this.name = 'PortalRelayError';
    this.debug = parseDebugBlock(details);
    Object.setPrototypeOf(this, PortalRelayError.prototype);
  }
}

export class InvalidRequestError extends PortalRelayError {
  constructor(message: string, code = 'VALIDATION_ERROR', details?: Record<string, unknown>, raw?: unknown) {
    super(message, code, 400, details, raw);
    this.name = 'InvalidRequestError';
    Object.setPrototypeOf(this, InvalidRequestError.prototype);
  }
}

export class AuthenticationError extends PortalRelayError {
  constructor(message = 'Missing or invalid x-api-key', raw?: unknown) {
    super(message, 'UNAUTHORIZED', 401, undefined, raw);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

export class NotFoundError extends PortalRelayError {
  constructor(message = 'Resource not found', code = 'NOT_FOUND', raw?: unknown) {
    super(message, code, 404, undefined, raw);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class ExpiredError extends PortalRelayError {
  constructor(message = 'Resource has expired', code = 'EXPIRED', raw?: unknown) {
    super(message, code, 410, undefined, raw);
    this.name = 'ExpiredError';
    Object.setPrototypeOf(this, ExpiredError.prototype);
  }
}

export class ServiceUnavailableError extends PortalRelayError {
  constructor(message: string, code = 'NOT_CONFIGURED', raw?: unknown) {
    super(message, code, 503, undefined, raw);
    this.name = 'ServiceUnavailableError';
    Object.setPrototypeOf(this, ServiceUnavailableError.prototype);
  }
}
