import type { Audience, Notifier } from '../ports.js';

export interface SentNotification {
  audience: Audience;
  text: string;
}

export class RecordingNotifier implements Notifier {
  readonly sent: SentNotification[] = [];
  /** Thrown from every notify call while set */
  failWith: unknown = null;

  async notify(audience: Audience, text: string): Promise<void> {
    if (this.failWith !== null) {
      throw this.failWith;
    }
    this.sent.push({ audience, text });
  }

  textsFor(kind: Audience['kind']): string[] {
    return this.sent.filter((n) => n.audience.kind === kind).map((n) => n.text);
  }
}
