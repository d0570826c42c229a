import {
  NotFoundError,
  SundownError,
  TransientCollaboratorError,
} from '@sundown/common';

const COLLABORATOR = 'proxmox';

/** 5xx, 429, network failure or timeout. Retried on the next poll. */
export class ProxmoxTransientError extends TransientCollaboratorError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(COLLABORATOR, message, options);
    this.name = 'ProxmoxTransientError';
  }
}

export class ProxmoxNotFoundError extends NotFoundError {
  constructor(vmid: string) {
    super('Container', vmid);
    this.name = 'ProxmoxNotFoundError';
  }
}

/** Token rejected or lacking privileges. Fatal when seen at startup. */
export class ProxmoxAuthError extends SundownError {
  constructor(
    message: string,
    public readonly statusCode: number,
  ) {
    super(message, 'PROXMOX_AUTH_FAILED', false);
    this.name = 'ProxmoxAuthError';
  }
}

/** Any other 4xx: the request itself is wrong and retrying will not help. */
export class ProxmoxAPIError extends SundownError {
  constructor(
    message: string,
    public readonly statusCode: number,
  ) {
    super(message, 'PROXMOX_API_ERROR', false);
    this.name = 'ProxmoxAPIError';
  }
}

/**
 * Map a failed response to the error taxonomy. Proxmox reports a missing
 * guest as "500 Configuration file ... does not exist", so the message is
 * checked before the status code.
 */
export function classifyProxmoxFailure(
  status: number,
  message: string,
  vmid?: string,
): SundownError {
  if (vmid !== undefined && (status === 404 || /does not exist/i.test(message))) {
    return new ProxmoxNotFoundError(vmid);
  }
  if (status === 401 || status === 403) {
    return new ProxmoxAuthError(`Proxmox rejected credentials: ${status} ${message}`, status);
  }
  if (status === 429 || status >= 500) {
    return new ProxmoxTransientError(`HTTP ${status} ${message}`, status);
  }
  return new ProxmoxAPIError(`Proxmox request failed: ${status} ${message}`, status);
}
