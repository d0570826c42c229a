export {
  ProxmoxTransientError,
  ProxmoxNotFoundError,
  ProxmoxAuthError,
  ProxmoxAPIError,
  classifyProxmoxFailure,
} from './proxmox-error.js';
