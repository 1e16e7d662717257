/**
 * Delivery-side interfaces
 */

import { ResourceStatus, Transition } from './tenant';

/** Content of the per-tenant status message that is replaced on every transition. */
export interface StatusBoard {
  resource_name: string;
  resource_address: string;
  status: ResourceStatus;
  since: Date;
}

export interface Notifier {
  notify(channel: string, role: string | null, message: string): Promise<void>;

  /** Text substituted for `%%ROLE%%`. */
  mentionRole(role: string | null): string;

  /**
   * Replace the status message of a channel.
   * @returns id of the new message, or null when nothing was posted
   */
  publishStatus?(channel: string, board: StatusBoard, previousMessageId: string | null): Promise<string | null>;
}

/** Receiver of confirmed transitions. Must not block the producer. */
export interface TransitionSink {
  push(transition: Transition): void;
}
