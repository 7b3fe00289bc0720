/**
 * Mapping from wallet notifications to persisted domain events.
 *
 * Amounts become decimal strings; timestamps become ISO 8601.
 */

import type { DomainEvent } from "@multicustody/types";
import type { ApprovalEvent } from "./types.js";

export const APPROVAL_EVENT_TYPES = {
  submission: "approval.submission",
  approval: "approval.approval",
  revocation: "approval.revocation",
  execution: "approval.execution",
  cancellation: "approval.cancellation",
} as const satisfies Record<ApprovalEvent["type"], string>;

function payloadOf(event: ApprovalEvent): Record<string, unknown> {
  switch (event.type) {
    case "submission":
    case "execution":
      return { proposalId: event.proposalId, to: event.to, amount: event.amount.toString() };
    case "cancellation":
      return { proposalId: event.proposalId, reason: event.reason };
    case "approval":
    case "revocation":
      return { proposalId: event.proposalId };
  }
}

export function toDomainEvent(
  event: ApprovalEvent,
  wallet: string,
  sequence: number,
): DomainEvent {
  return {
    type: APPROVAL_EVENT_TYPES[event.type],
    metadata: {
      eventId: `${wallet}:${String(sequence)}`,
      timestamp: new Date(event.timestamp * 1000).toISOString(),
      actor: event.actor,
      correlationId: `${wallet}:proposal:${String(event.proposalId)}`,
      source: "approval",
    },
    payload: payloadOf(event),
  };
}
