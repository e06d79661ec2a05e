import type { Decision, OptionCount, Proposal, ProposalTally } from '../shared/types.js';
import type { GovernanceModel } from './governance-models/index.js';

/**
 * Results in declaration order. Binary proposals report `yes` then `no`.
 */
export function resultsOf(proposal: Proposal, tally: ProposalTally): OptionCount[] {
  if (proposal.options === null) {
    return [
      { option: 'yes', count: tally.yes },
      { option: 'no', count: tally.no },
    ];
  }
  return tally.options.map((o) => ({ ...o }));
}

/**
 * The leading option, or null when nothing has votes or the top is tied.
 */
export function winningOption(results: OptionCount[]): string | null {
  let best: OptionCount | null = null;
  let tied = false;
  for (const entry of results) {
    if (best === null || entry.count > best.count) {
      best = entry;
      tied = false;
    } else if (entry.count === best.count) {
      tied = true;
    }
  }
  if (!best || best.count === 0 || tied) return null;
  return best.option;
}

/**
 * Apply a governance model to a proposal's running counters against its
 * fixed supply baseline. Reads counters only, so the cost does not grow
 * with the number of votes cast.
 */
export function decide(proposal: Proposal, tally: ProposalTally, model: GovernanceModel): Decision {
  const results = resultsOf(proposal, tally);
  const supply = proposal.supplyBaseline;

  let affirmative: number;
  let negative: number;
  let winner: string | null;

  if (proposal.options === null) {
    affirmative = tally.yes;
    negative = tally.no;
    winner = null;
  } else {
    winner = winningOption(results);
    const total = results.reduce((sum, r) => sum + r.count, 0);
    affirmative = winner === null ? 0 : results.reduce((max, r) => Math.max(max, r.count), 0);
    negative = total - affirmative;
  }

  const passed = model.passes(affirmative, supply);

  return {
    proposalId: proposal.id,
    model: model.name,
    affirmative,
    negative,
    supplyBaseline: supply,
    threshold: model.threshold(supply),
    passed,
    results,
    winningOption: winner,
    summary: model.summarize(affirmative, supply),
  };
}
