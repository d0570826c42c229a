/**
 * Types for the Proxmox VE integration
 */

export interface ProxmoxConfig {
  /** API base URL, e.g. https://pve.example.com:8006/api2/json */
  apiUrl: string;
  /** API token id in `user@realm!tokenname` form */
  tokenId: string;
  /** API token secret (uuid) */
  tokenSecret: string;
  /** Node that hosts the containers */
  node: string;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  /** Delay between task status polls while waiting for a destroy to finish */
  taskPollIntervalMs?: number;
  /** Give up waiting for a task after this long */
  taskTimeoutMs?: number;
}

/**
 * Injectable fetch function. globalThis.fetch in production, a stub in tests.
 */
export type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export type ProxmoxMethod = 'GET' | 'POST' | 'DELETE';
