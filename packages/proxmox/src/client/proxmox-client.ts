import { z } from 'zod';
import {
  createLogger,
  errorMessage,
  SundownError,
  systemClock,
  ValidationError,
  type ResourceStatus,
  type ResourceSummary,
} from '@sundown/common';
import type { FetchFn, ProxmoxConfig, ProxmoxMethod } from '../types.js';
import {
  ProxmoxNotFoundError,
  ProxmoxTransientError,
  classifyProxmoxFailure,
} from '../errors/proxmox-error.js';

const logger = createLogger('proxmox-client');

const DEFAULT_TIMEOUT_MS = 15_000;
const DEFAULT_TASK_POLL_INTERVAL_MS = 1_000;
const DEFAULT_TASK_TIMEOUT_MS = 60_000;

const containerSchema = z.object({
  vmid: z.union([z.number(), z.string()]).transform(String),
  name: z.string().optional(),
  status: z.string().optional(),
});

const containerListSchema = z.object({ data: z.array(containerSchema) });

/** Lifecycle calls answer with a task UPID (or null on some versions) */
const taskSchema = z.object({ data: z.string().nullable().optional() });

const taskStatusSchema = z.object({
  data: z.object({
    status: z.string(),
    exitstatus: z.string().optional(),
  }),
});

interface ProxmoxRequest {
  method: ProxmoxMethod;
  path: string;
  params?: Record<string, string>;
  /** vmid the request targets; enables not-found classification */
  vmid?: string;
  signal?: AbortSignal;
}

function normalizeStatus(status: string | undefined): ResourceStatus {
  if (status === 'running' || status === 'stopped') return status;
  return 'unknown';
}

function assertVmid(vmid: string): void {
  if (!/^\d+$/.test(vmid)) {
    throw new ValidationError(`Invalid container id: ${vmid}`);
  }
}

/**
 * Client for the Proxmox VE REST API, scoped to the LXC containers of one node.
 * Implements the resource-control capability the reconciler consumes.
 */
export class ProxmoxClient {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;

  constructor(
    private readonly config: ProxmoxConfig,
    fetchFn?: FetchFn,
  ) {
    this.baseUrl = config.apiUrl.replace(/\/+$/, '');
    this.fetchFn = fetchFn ?? globalThis.fetch.bind(globalThis);
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async listContainers(signal?: AbortSignal): Promise<ResourceSummary[]> {
    const body = await this.request({
      method: 'GET',
      path: `/nodes/${this.config.node}/lxc`,
      signal,
    });
    const parsed = containerListSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProxmoxTransientError(`Unexpected container list payload: ${parsed.error.message}`);
    }

    return parsed.data.data
      .map((container) => ({
        id: container.vmid,
        name: container.name ?? null,
        status: normalizeStatus(container.status),
      }))
      .sort((a, b) => Number(a.id) - Number(b.id));
  }

  async getContainer(vmid: string, signal?: AbortSignal): Promise<ResourceSummary> {
    assertVmid(vmid);
    const containers = await this.listContainers(signal);
    const container = containers.find((c) => c.id === vmid);
    if (!container) {
      throw new ProxmoxNotFoundError(vmid);
    }
    return container;
  }

  /**
   * Existence is checked against the node's container list rather than the
   * per-guest endpoint, which answers a missing guest with a generic 500.
   */
  async exists(vmid: string, signal?: AbortSignal): Promise<boolean> {
    assertVmid(vmid);
    const containers = await this.listContainers(signal);
    return containers.some((c) => c.id === vmid);
  }

  async status(vmid: string, signal?: AbortSignal): Promise<ResourceStatus> {
    const container = await this.getContainer(vmid, signal);
    return container.status;
  }

  async start(vmid: string, signal?: AbortSignal): Promise<string | null> {
    assertVmid(vmid);
    return this.runTask({
      method: 'POST',
      path: `/nodes/${this.config.node}/lxc/${vmid}/status/start`,
      vmid,
      signal,
    });
  }

  async stop(vmid: string, signal?: AbortSignal): Promise<string | null> {
    assertVmid(vmid);
    return this.runTask({
      method: 'POST',
      path: `/nodes/${this.config.node}/lxc/${vmid}/status/stop`,
      vmid,
      signal,
    });
  }

  /**
   * Destroy the container and wait for the destroy task to finish. `force`
   * removes it even while running and `purge` drops it from backup jobs and
   * HA config.
   */
  async delete(vmid: string, signal?: AbortSignal): Promise<void> {
    assertVmid(vmid);
    const upid = await this.runTask({
      method: 'DELETE',
      path: `/nodes/${this.config.node}/lxc/${vmid}`,
      params: { force: '1', purge: '1' },
      vmid,
      signal,
    });
    logger.info({ vmid, upid }, 'Container destroy task submitted');

    if (upid) {
      await this.waitForTask(upid, signal);
    }
    logger.info({ vmid, upid }, 'Container destroyed');
  }

  /**
   * Poll a task until it stops. A task that stops with anything but `OK`, or
   * that outlives `taskTimeoutMs`, fails as transient.
   */
  private async waitForTask(upid: string, signal?: AbortSignal): Promise<void> {
    const pollIntervalMs = this.config.taskPollIntervalMs ?? DEFAULT_TASK_POLL_INTERVAL_MS;
    const deadline = Date.now() + (this.config.taskTimeoutMs ?? DEFAULT_TASK_TIMEOUT_MS);

    for (;;) {
      const body = await this.request({
        method: 'GET',
        path: `/nodes/${this.config.node}/tasks/${encodeURIComponent(upid)}/status`,
        signal,
      });
      const parsed = taskStatusSchema.safeParse(body);
      if (!parsed.success) {
        throw new ProxmoxTransientError(`Unexpected task status payload: ${parsed.error.message}`);
      }

      const { status, exitstatus } = parsed.data.data;
      if (status === 'stopped') {
        if (exitstatus === 'OK') return;
        throw new ProxmoxTransientError(`Task ${upid} failed: ${exitstatus ?? 'no exit status'}`);
      }
      if (Date.now() >= deadline) {
        throw new ProxmoxTransientError(`Task ${upid} still ${status} after waiting`);
      }

      logger.debug({ upid, status }, 'Waiting for Proxmox task');
      await systemClock.sleep(pollIntervalMs, signal);
      if (signal?.aborted) {
        throw new ProxmoxTransientError(`Stopped waiting for task ${upid}`);
      }
    }
  }

  private async runTask(req: ProxmoxRequest): Promise<string | null> {
    const body = await this.request(req);
    const parsed = taskSchema.safeParse(body);
    return parsed.success ? (parsed.data.data ?? null) : null;
  }

  private async request(req: ProxmoxRequest): Promise<unknown> {
    const url = this.buildUrl(req.path, req.params);
    const startTime = Date.now();

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const onOuterAbort = () => controller.abort();
    req.signal?.addEventListener('abort', onOuterAbort, { once: true });

    logger.debug({ method: req.method, url }, 'Executing Proxmox request');

    try {
      const response = await this.fetchFn(url, {
        method: req.method,
        headers: {
          Authorization: `PVEAPIToken=${this.config.tokenId}=${this.config.tokenSecret}`,
          Accept: 'application/json',
        },
        signal: controller.signal,
      });

      const durationMs = Date.now() - startTime;

      if (!response.ok) {
        const text = await response.text();
        const message = [response.statusText, text].filter(Boolean).join(' ').trim();
        logger.warn(
          { method: req.method, url, status: response.status, message, durationMs },
          'Proxmox request failed',
        );
        throw classifyProxmoxFailure(response.status, message, req.vmid);
      }

      logger.debug({ method: req.method, url, status: response.status, durationMs }, 'Proxmox request successful');
      return await response.json();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new ProxmoxTransientError(`Request aborted after ${Date.now() - startTime}ms`, undefined, {
          cause: error,
        });
      }
      if (error instanceof SundownError) {
        throw error;
      }
      logger.error({ error: errorMessage(error), method: req.method, url }, 'Proxmox request error');
      throw new ProxmoxTransientError(errorMessage(error), undefined, { cause: error });
    } finally {
      clearTimeout(timeoutId);
      req.signal?.removeEventListener('abort', onOuterAbort);
    }
  }

  private buildUrl(path: string, params?: Record<string, string>): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params ?? {})) {
      url.searchParams.append(key, value);
    }
    return url.toString();
  }
}
