// Client
export { ProxmoxClient } from './client/proxmox-client.js';

// Errors
export {
  ProxmoxTransientError,
  ProxmoxNotFoundError,
  ProxmoxAuthError,
  ProxmoxAPIError,
  classifyProxmoxFailure,
} from './errors/index.js';

// Types
export type { ProxmoxConfig, FetchFn, ProxmoxMethod } from './types.js';
