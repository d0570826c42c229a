import { NotFoundError, type ResourceStatus } from '@sundown/common';
import type { ResourceControl } from '../ports.js';

type ResourceMethod = 'exists' | 'status' | 'delete';

export class FakeResourceControl implements ResourceControl {
  readonly resources = new Map<string, ResourceStatus>();
  readonly deleteCalls: string[] = [];
  readonly existsCalls: string[] = [];
  readonly failures: Partial<Record<ResourceMethod, unknown>> = {};

  constructor(resources: Record<string, ResourceStatus> = {}) {
    for (const [id, status] of Object.entries(resources)) {
      this.resources.set(id, status);
    }
  }

  failOn(method: ResourceMethod, error: unknown): void {
    this.failures[method] = error;
  }

  clearFailure(method: ResourceMethod): void {
    delete this.failures[method];
  }

  async exists(resourceId: string): Promise<boolean> {
    this.existsCalls.push(resourceId);
    this.maybeFail('exists');
    return this.resources.has(resourceId);
  }

  async status(resourceId: string): Promise<ResourceStatus> {
    this.maybeFail('status');
    const status = this.resources.get(resourceId);
    if (!status) {
      throw new NotFoundError('Container', resourceId);
    }
    return status;
  }

  async delete(resourceId: string): Promise<void> {
    this.deleteCalls.push(resourceId);
    this.maybeFail('delete');
    if (!this.resources.delete(resourceId)) {
      throw new NotFoundError('Container', resourceId);
    }
  }

  private maybeFail(method: ResourceMethod): void {
    if (method in this.failures) {
      throw this.failures[method];
    }
  }
}
