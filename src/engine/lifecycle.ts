import type { Proposal, ProposalState } from '../shared/types.js';

export type LifecycleAction = 'open_voting' | 'finalize';

/**
 * Which states each action may start from. `closed` is never stored: it is
 * derived from the clock once the deadline has passed.
 *
 * There is no cancel/veto action. Adding one means a new action here with
 * `created` and `voting_open` as its sources, plus a terminal state.
 */
const ALLOWED_FROM: Record<LifecycleAction, ProposalState[]> = {
  open_voting: ['created'],
  finalize: ['closed'],
};

export function proposalState(proposal: Proposal, now: number): ProposalState {
  if (proposal.finalized) return 'finalized';
  if (now > proposal.deadline) return 'closed';
  if (proposal.votingStart === null) return 'created';
  return 'voting_open';
}

export function canPerform(action: LifecycleAction, state: ProposalState): boolean {
  return ALLOWED_FROM[action].includes(state);
}

/** Whether `now` falls inside the inclusive voting window. */
export function withinVotingWindow(proposal: Proposal, now: number): boolean {
  if (proposal.votingStart === null || proposal.finalized) return false;
  return now >= proposal.votingStart && now <= proposal.deadline;
}
