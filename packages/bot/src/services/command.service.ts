import {
  ConfirmationActionKind,
  createLogger,
  errorMessage,
  NotFoundError,
  systemClock,
  TimeParser,
  type Clock,
  type Command,
  type ConfirmationResponse,
  type IntentSnapshot,
  type ResourceStatus,
  type ResourceSummary,
} from '@sundown/common';
import type { ConfirmationRegistry, EventStore, Notifier } from '@sundown/reconciler';
import type { HealthService } from './health.service.js';

const logger = createLogger('command-service');

/** Container lifecycle calls the command layer makes (ProxmoxClient satisfies it) */
export interface ContainerControl {
  listContainers(): Promise<ResourceSummary[]>;
  getContainer(resourceId: string): Promise<ResourceSummary>;
  status(resourceId: string): Promise<ResourceStatus>;
  start(resourceId: string): Promise<string | null>;
  stop(resourceId: string): Promise<string | null>;
}

/** What a confirmation token carries until its requester answers */
export type PendingAction =
  | { kind: typeof ConfirmationActionKind.STOP_RESOURCE; resourceId: string; resourceName: string | null }
  | {
      kind: typeof ConfirmationActionKind.SCHEDULE_DELETION;
      resourceId: string;
      resourceName: string | null;
      executeAt: Date;
    };

export interface CommandReply {
  text: string;
  /** Set when the reply asks for confirmation; rendered as buttons */
  confirmationId?: string;
  /** Only the acting user should see this reply */
  ephemeral?: boolean;
}

export interface CommandContext {
  userId: string;
}

export interface CommandServiceDeps {
  resources: ContainerControl;
  eventStore: EventStore;
  notifier: Notifier;
  confirmations: ConfirmationRegistry<PendingAction>;
  health: Pick<HealthService, 'getHealth'>;
}

export interface CommandServiceOptions {
  deletionDelayDays: number;
  timezone: string;
}

export const HELP_TEXT = [
  'Here is what I can do:',
  '• `list containers`: show every container and its status',
  '• `start <id>` / `stop <id>`: start or stop a container (stopping asks for confirmation)',
  '• `delete <id> [when]`: schedule a container for deletion, e.g. `delete 103 in 5 days`',
  '• `list scheduled`: show pending deletions',
  '• `cancel <id>`: cancel a scheduled deletion',
  '• `confirm <code>` / `cancel <code>`: answer a confirmation request',
  '• `status`: show whether the reconciler and Slack delivery are healthy',
].join('\n');

function label(resourceId: string, resourceName: string | null): string {
  return resourceName ? `${resourceId} (${resourceName})` : resourceId;
}

/**
 * Executes parsed commands against the container host and the event store.
 * Destructive commands only issue a confirmation token; the work happens
 * when the requester confirms it.
 */
export class CommandService {
  constructor(
    private readonly deps: CommandServiceDeps,
    private readonly options: CommandServiceOptions,
    private readonly clock: Clock = systemClock,
  ) {}

  async handle(command: Command, ctx: CommandContext): Promise<CommandReply> {
    logger.info({ command: command.type, userId: ctx.userId }, 'Handling command');

    switch (command.type) {
      case 'list_resources':
        return this.listResources();
      case 'start_resource':
        return this.startResource(command.resourceId);
      case 'stop_resource':
        return this.stopResource(command.resourceId, ctx);
      case 'schedule_deletion':
        return this.scheduleDeletion(command.resourceId, command.when, ctx);
      case 'list_scheduled':
        return this.listScheduled();
      case 'cancel_deletion':
        return this.cancelDeletion(command.resourceId, ctx);
      case 'respond_confirmation':
        return this.respondConfirmation(command.confirmationId, command.response, ctx);
      case 'status':
        return this.status();
      case 'help':
        return { text: HELP_TEXT };
    }
  }

  private status(): CommandReply {
    const health = this.deps.health.getHealth();
    const { reconciler, slack, confirmations } = health.components;

    const lastCheck = reconciler.lastCycleAt ? `last check ${this.format(reconciler.lastCycleAt)}` : 'no check yet';
    const lastFailure = slack.lastFailure
      ? `, last: ${slack.lastFailure.operation} to ${slack.lastFailure.channel} (${slack.lastFailure.error})`
      : '';
    const lines = [
      `Status: ${health.status}`,
      `• Reconciler: ${reconciler.status}, ${lastCheck}, ${reconciler.trackedIntents} tracked, ` +
        `${reconciler.executedIntents} deleted since start, ${reconciler.consecutiveIterationFailures} failed listings in a row`,
      `• Slack: ${slack.status}, ${slack.failedMessages} undelivered${lastFailure}`,
      `• Confirmations: ${confirmations.pending} pending`,
    ];
    return { text: lines.join('\n') };
  }

  private async listResources(): Promise<CommandReply> {
    const containers = await this.deps.resources.listContainers();
    if (containers.length === 0) {
      return { text: 'No containers found in Proxmox.' };
    }

    const lines = containers.map((c) =>
      c.name ? `• ${c.id} (${c.name}, ${c.status})` : `• ${c.id} (${c.status})`,
    );
    return { text: `Here are the current containers:\n${lines.join('\n')}` };
  }

  private async startResource(resourceId: string): Promise<CommandReply> {
    const container = await this.findContainer(resourceId);
    if (!container) {
      return { text: `Container ${resourceId} does not exist.` };
    }

    const name = label(container.id, container.name);
    if (container.status === 'running') {
      return { text: `Container ${name} is already running.` };
    }

    await this.deps.resources.start(resourceId);
    logger.info({ resourceId }, 'Container start requested');
    return { text: `Container ${name} is being started.` };
  }

  private async stopResource(resourceId: string, ctx: CommandContext): Promise<CommandReply> {
    const container = await this.findContainer(resourceId);
    if (!container) {
      return { text: `Container ${resourceId} does not exist.` };
    }

    const name = label(container.id, container.name);
    if (container.status === 'stopped') {
      return { text: `Container ${name} is already stopped.` };
    }

    const confirmationId = this.deps.confirmations.create(
      ConfirmationActionKind.STOP_RESOURCE,
      { kind: ConfirmationActionKind.STOP_RESOURCE, resourceId, resourceName: container.name },
      ctx.userId,
    );
    return {
      text: `Stop container ${name}? Reply \`confirm ${confirmationId}\` to proceed or \`cancel ${confirmationId}\` to leave it running.`,
      confirmationId,
    };
  }

  private async scheduleDeletion(
    resourceId: string,
    when: string | undefined,
    ctx: CommandContext,
  ): Promise<CommandReply> {
    const container = await this.findContainer(resourceId);
    if (!container) {
      return { text: `Container ${resourceId} does not exist.` };
    }

    const name = label(container.id, container.name);
    const existing = await this.openIntentFor(resourceId);
    if (existing) {
      return {
        text: `Container ${name} is already scheduled for deletion on ${this.format(existing.executeAt)}. Cancel it first to reschedule.`,
      };
    }

    const now = this.clock.now();
    let executeAt: Date;
    if (when) {
      const parsed = TimeParser.parseNatural(when, now, this.options.timezone);
      if (!parsed) {
        return { text: `I couldn't understand "${when}" as a time. Try something like "in 3 days" or "on friday".` };
      }
      if (parsed.getTime() <= now.getTime()) {
        return { text: `${this.format(parsed)} is in the past. Pick a later time.` };
      }
      executeAt = parsed;
    } else {
      executeAt = TimeParser.endOfDayAfter(now, this.options.deletionDelayDays, this.options.timezone);
    }

    const confirmationId = this.deps.confirmations.create(
      ConfirmationActionKind.SCHEDULE_DELETION,
      { kind: ConfirmationActionKind.SCHEDULE_DELETION, resourceId, resourceName: container.name, executeAt },
      ctx.userId,
    );
    return {
      text: `Schedule container ${name} for deletion on ${this.format(executeAt)}? Reply \`confirm ${confirmationId}\` to proceed or \`cancel ${confirmationId}\` to keep it.`,
      confirmationId,
    };
  }

  private async listScheduled(): Promise<CommandReply> {
    const intents = await this.deps.eventStore.listOpen();
    if (intents.length === 0) {
      return { text: 'No containers are currently scheduled for deletion.' };
    }

    const lines = [...intents]
      .sort((a, b) => a.executeAt.getTime() - b.executeAt.getTime())
      .map((intent) => {
        const requestedBy = intent.requestor ? `, requested by <@${intent.requestor}>` : '';
        return `• ${label(intent.resourceId, intent.resourceName)} (deletes ${this.format(intent.executeAt)}${requestedBy})`;
      });
    return { text: `The following containers are scheduled for deletion:\n${lines.join('\n')}` };
  }

  private async cancelDeletion(resourceId: string, ctx: CommandContext): Promise<CommandReply> {
    const intents = (await this.deps.eventStore.listOpen()).filter((i) => i.resourceId === resourceId);
    const [first] = intents;
    if (!first) {
      return { text: `Container ${resourceId} is not scheduled for deletion.` };
    }

    for (const intent of intents) {
      try {
        await this.deps.eventStore.delete(intent.intentId);
      } catch (error) {
        if (!(error instanceof NotFoundError)) throw error;
      }
    }
    logger.info({ resourceId, intents: intents.map((i) => i.intentId), userId: ctx.userId }, 'Deletion cancelled');

    const name = label(resourceId, first.resourceName);
    await this.announce(`:information_source: The scheduled deletion of container ${name} was cancelled by <@${ctx.userId}>.`);
    return { text: `The scheduled deletion of container ${name} has been cancelled.` };
  }

  private async respondConfirmation(
    confirmationId: string,
    response: ConfirmationResponse,
    ctx: CommandContext,
  ): Promise<CommandReply> {
    const result = this.deps.confirmations.resolve(confirmationId, response, ctx.userId);

    switch (result.status) {
      case 'not_found':
        return { text: `There is no pending request \`${confirmationId}\`. It may have been answered already.` };
      case 'forbidden':
        return { text: 'Only the person who made this request can confirm or cancel it.', ephemeral: true };
      case 'expired':
        return { text: `Request \`${confirmationId}\` has expired. Please ask again.` };
      case 'cancelled':
        return { text: `Cancelled: ${this.describe(result.token.params)}.` };
      case 'confirmed':
        try {
          return await this.runConfirmed(result.token.params, ctx);
        } catch (error) {
          logger.error(
            { confirmationId, action: result.token.actionKind, error: errorMessage(error) },
            'Confirmed action failed',
          );
          return { text: `:x: Could not ${this.describe(result.token.params)}: ${errorMessage(error)}` };
        }
    }
  }

  private async runConfirmed(action: PendingAction, ctx: CommandContext): Promise<CommandReply> {
    const name = label(action.resourceId, action.resourceName);

    if (action.kind === ConfirmationActionKind.STOP_RESOURCE) {
      await this.deps.resources.stop(action.resourceId);
      logger.info({ resourceId: action.resourceId, userId: ctx.userId }, 'Container stop requested');
      return { text: `Container ${name} is being stopped.` };
    }

    // Another request may have scheduled it while this one waited
    const existing = await this.openIntentFor(action.resourceId);
    if (existing) {
      return {
        text: `Container ${name} is already scheduled for deletion on ${this.format(existing.executeAt)}.`,
      };
    }
    if (action.executeAt.getTime() <= this.clock.now().getTime()) {
      return { text: `${this.format(action.executeAt)} has passed while waiting for confirmation. Please schedule again.` };
    }

    const intentId = await this.deps.eventStore.create({
      resourceId: action.resourceId,
      resourceName: action.resourceName,
      requestor: ctx.userId,
      createdAt: this.clock.now(),
      executeAt: action.executeAt,
    });
    logger.info({ intentId, resourceId: action.resourceId, userId: ctx.userId }, 'Deletion scheduled');

    const when = this.format(action.executeAt);
    await this.announce(
      `:calendar: Container ${name} is scheduled for deletion on ${when} (requested by <@${ctx.userId}>).`,
    );
    return { text: `Container ${name} will be deleted on ${when}. A reminder will go out beforehand.` };
  }

  private describe(action: PendingAction): string {
    const name = label(action.resourceId, action.resourceName);
    return action.kind === ConfirmationActionKind.STOP_RESOURCE
      ? `stop container ${name}`
      : `delete container ${name} on ${this.format(action.executeAt)}`;
  }

  private async findContainer(resourceId: string): Promise<ResourceSummary | null> {
    try {
      return await this.deps.resources.getContainer(resourceId);
    } catch (error) {
      if (error instanceof NotFoundError) return null;
      throw error;
    }
  }

  private async openIntentFor(resourceId: string): Promise<IntentSnapshot | undefined> {
    const intents = await this.deps.eventStore.listOpen();
    return intents.find((i) => i.resourceId === resourceId);
  }

  /** Broadcast failures do not undo the command; the intent is already stored */
  private async announce(text: string): Promise<void> {
    try {
      await this.deps.notifier.notify({ kind: 'broadcast' }, text);
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Broadcast announcement failed');
    }
  }

  private format(date: Date): string {
    return TimeParser.format(date, this.options.timezone);
  }
}
