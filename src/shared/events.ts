import type { VoteChoice } from './types.js';

// ── Governance events (append-only, sequenced per kind) ──

export type GovernanceEventPayload =
  | { kind: 'proposal_created'; proposalId: number; description: string; deadline: number }
  | { kind: 'voting_started'; proposalId: number; start: number }
  | { kind: 'vote_cast'; proposalId: number; voter: string; choice: VoteChoice; weight: number }
  | { kind: 'proposal_finalized'; proposalId: number; yes: number; no: number }
  | { kind: 'fraction_created'; fractionId: number; assetId: string; amount: number }
  | { kind: 'tokens_locked'; holder: string; shareClass: string; amount: number; unlockAt: number }
  | { kind: 'tokens_unlocked'; holder: string; shareClass: string; amount: number };

export type GovernanceEventKind = GovernanceEventPayload['kind'];

export type GovernanceEvent = GovernanceEventPayload & {
  seq: number;
  at: number;
};

export const GOVERNANCE_EVENT_KINDS = [
  'proposal_created',
  'voting_started',
  'vote_cast',
  'proposal_finalized',
  'fraction_created',
  'tokens_locked',
  'tokens_unlocked',
] as const satisfies readonly GovernanceEventKind[];

export interface EventQuery {
  kind?: GovernanceEventKind;
  afterSeq?: number;
  limit?: number;
}

// ── WebSocket events (server → clients) ──

export type WsEvent =
  | { type: 'governance:event'; event: GovernanceEvent }
  | { type: 'hello'; name: string };
