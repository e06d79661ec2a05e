import { z } from 'zod';
import { GOVERNANCE_EVENT_KINDS } from './events.js';

// ── Zod schemas for YAML config validation ──

const GovernanceModelSchema = z.enum(['simple_majority', 'supermajority', 'consensus']);
const VoteWeightingSchema = z.enum(['one_per_holder', 'balance']);

const ShareClassSeedSchema = z.object({
  id: z.string().min(1),
  holders: z.record(z.number().int().min(0)).default({}),
});

const ApiTokenSchema = z.object({
  identity: z.string().min(1),
  token: z.string().min(1),
});

const DefaultsSchema = z.object({
  share_class: z.string().min(1).default('GOV'),
  model: GovernanceModelSchema.default('simple_majority'),
  weighting: VoteWeightingSchema.default('one_per_holder'),
});

const GovernanceBodySchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  operators: z.array(z.string().min(1)).min(1, 'At least one operator is required'),
  defaults: DefaultsSchema.default({}),
  api_tokens: z.array(ApiTokenSchema).default([]),
  ledger: z.object({
    share_classes: z.array(ShareClassSeedSchema).default([]),
  }).default({}),
});

export const GovernanceConfigSchema = z.object({
  version: z.literal('1'),
  governance: GovernanceBodySchema,
});

export type ValidatedGovernanceConfig = z.infer<typeof GovernanceConfigSchema>;

// Cross-field checks zod cannot express per field
export function validateReferences(config: ValidatedGovernanceConfig): string[] {
  const errors: string[] = [];
  const { governance } = config;

  const classIds = governance.ledger.share_classes.map((c) => c.id);
  const seen = new Set<string>();
  for (const id of classIds) {
    if (seen.has(id)) errors.push(`Share class "${id}" is declared more than once`);
    seen.add(id);
  }
  if (classIds.length > 0 && !seen.has(governance.defaults.share_class)) {
    errors.push(`Default share class "${governance.defaults.share_class}" not found in ledger.share_classes`);
  }

  const tokens = new Set<string>();
  for (const entry of governance.api_tokens) {
    if (tokens.has(entry.token)) {
      errors.push(`API token for "${entry.identity}" is already assigned to another identity`);
    }
    tokens.add(entry.token);
  }

  return errors;
}

// ── Request body schemas for the HTTP API ──

const timestamp = z.number().int().nonnegative();

export const CreateProposalBody = z.object({
  description: z.string().min(1),
  options: z.array(z.string()).optional(),
  deadline: timestamp,
  shareClass: z.string().min(1).optional(),
  weighting: VoteWeightingSchema.optional(),
  quorumBase: z.number().int().positive().optional(),
});

const startTime = z.number().int().positive();

export const OpenVotingBody = z.object({
  votingStart: startTime,
});

export const CastVoteBody = z.object({
  choice: z.union([z.boolean(), z.string()]),
});

export const CreateFractionBody = z.object({
  assetId: z.string().min(1),
  shareClass: z.string().min(1),
  owner: z.string().min(1),
});

export const FractionVoteBody = z.object({
  description: z.string().min(1),
  deadline: timestamp,
  votingStart: startTime.optional(),
});

export const LockBody = z.object({
  shareClass: z.string().min(1),
  amount: z.number().int().positive(),
  unlockAt: timestamp,
});

export const UnlockBody = z.object({
  shareClass: z.string().min(1),
  amount: z.number().int().positive().optional(),
});

export const GovernanceModelParam = GovernanceModelSchema;

export const EventKindParam = z.enum(GOVERNANCE_EVENT_KINDS);

// ── Stored event payloads (read back from the database) ──

const VoteChoiceSchema = z.union([z.boolean(), z.string()]);

export const GovernanceEventPayloadSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('proposal_created'), proposalId: z.number(), description: z.string(), deadline: z.number() }),
  z.object({ kind: z.literal('voting_started'), proposalId: z.number(), start: z.number() }),
  z.object({ kind: z.literal('vote_cast'), proposalId: z.number(), voter: z.string(), choice: VoteChoiceSchema, weight: z.number() }),
  z.object({ kind: z.literal('proposal_finalized'), proposalId: z.number(), yes: z.number(), no: z.number() }),
  z.object({ kind: z.literal('fraction_created'), fractionId: z.number(), assetId: z.string(), amount: z.number() }),
  z.object({ kind: z.literal('tokens_locked'), holder: z.string(), shareClass: z.string(), amount: z.number(), unlockAt: z.number() }),
  z.object({ kind: z.literal('tokens_unlocked'), holder: z.string(), shareClass: z.string(), amount: z.number() }),
]);

export const StoredVoteChoice = VoteChoiceSchema;
