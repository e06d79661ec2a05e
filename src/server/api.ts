import { Router, type Request, type Response } from 'express';
import type { z } from 'zod';
import type { GovernanceEngine } from '../engine/governance-engine.js';
import { GovernanceError, type GovernanceErrorCode } from '../engine/errors.js';
import {
  CastVoteBody,
  CreateFractionBody,
  CreateProposalBody,
  EventKindParam,
  FractionVoteBody,
  GovernanceModelParam,
  LockBody,
  OpenVotingBody,
  UnlockBody,
} from '../shared/schemas.js';
import type { GovernanceModelName, VoteChoice } from '../shared/types.js';

const STATUS_BY_CODE: Record<GovernanceErrorCode, number> = {
  NotFound: 404,
  Unauthorized: 403,
  InvalidDeadline: 400,
  InvalidWindow: 400,
  InvalidAmount: 400,
  VotingNotStarted: 400,
  VotingClosed: 400,
  AlreadyVoted: 409,
  NoVotingWeight: 400,
  InvalidOption: 400,
  TooEarly: 400,
  AlreadyFinalized: 409,
  InsufficientBalance: 400,
  InsufficientLocked: 400,
};

function sendError(res: Response, err: unknown): void {
  if (err instanceof GovernanceError) {
    res.status(STATUS_BY_CODE[err.code]).json({ error: err.message, code: err.code });
    return;
  }
  console.error('[API] Unexpected error:', err);
  res.status(500).json({ error: 'Internal error' });
}

function parseBody<T extends z.ZodTypeAny>(schema: T, req: Request, res: Response): z.infer<T> | null {
  const result = schema.safeParse(req.body);
  if (!result.success) {
    res.status(400).json({
      error: 'Invalid request body',
      details: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
    return null;
  }
  return result.data;
}

function parseId(raw: string | undefined, res: Response): number | null {
  const id = Number(raw);
  if (!Number.isSafeInteger(id) || id <= 0) {
    res.status(400).json({ error: `Invalid id: ${raw}` });
    return null;
  }
  return id;
}

function callerOf(req: Request, res: Response): string | null {
  if (!req.caller) {
    res.status(401).json({ error: 'Authentication required' });
    return null;
  }
  return req.caller;
}

/** Binary proposals accept yes/no/true/false in query strings. */
function queryChoice(raw: string, binary: boolean): VoteChoice {
  if (!binary) return raw;
  if (raw === 'true' || raw === 'yes') return true;
  if (raw === 'false' || raw === 'no') return false;
  return raw;
}

/**
 * REST API routes. Mounted behind auth.protect, so every handler has a caller.
 */
export function createApiRouter(engine: GovernanceEngine): Router {
  const router = Router();

  // ── Proposals ──

  router.get('/proposals', (_req: Request, res: Response) => {
    const now = engine.now();
    res.json(engine.listProposals().map((proposal) => ({
      ...proposal,
      state: engine.getProposalState(proposal.id),
      now,
    })));
  });

  router.post('/proposals', (req: Request, res: Response) => {
    const caller = callerOf(req, res);
    if (caller === null) return;
    const body = parseBody(CreateProposalBody, req, res);
    if (body === null) return;
    try {
      res.status(201).json(engine.createProposal(caller, body));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/proposals/:id', (req: Request, res: Response) => {
    const id = parseId(req.params.id, res);
    if (id === null) return;
    try {
      res.json({
        proposal: engine.getProposal(id),
        state: engine.getProposalState(id),
        history: engine.getVotingHistory(id),
        results: engine.getResults(id),
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/proposals/:id/open', (req: Request, res: Response) => {
    const caller = callerOf(req, res);
    if (caller === null) return;
    const id = parseId(req.params.id, res);
    if (id === null) return;
    const body = parseBody(OpenVotingBody, req, res);
    if (body === null) return;
    try {
      res.json(engine.openVoting(caller, id, body.votingStart));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/proposals/:id/votes', (req: Request, res: Response) => {
    const caller = callerOf(req, res);
    if (caller === null) return;
    const id = parseId(req.params.id, res);
    if (id === null) return;
    const body = parseBody(CastVoteBody, req, res);
    if (body === null) return;
    try {
      res.status(201).json(engine.castVote(id, caller, body.choice));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/proposals/:id/votes', (req: Request, res: Response) => {
    const id = parseId(req.params.id, res);
    if (id === null) return;
    try {
      const option = req.query.option;
      if (typeof option === 'string') {
        const proposal = engine.getProposal(id);
        const choice = queryChoice(option, proposal.options === null);
        res.json({ option: choice, count: engine.getVotes(id, choice) });
        return;
      }
      res.json(engine.listVoteRecords(id));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/proposals/:id/finalize', (req: Request, res: Response) => {
    const caller = callerOf(req, res);
    if (caller === null) return;
    const id = parseId(req.params.id, res);
    if (id === null) return;
    try {
      res.json(engine.finalize(caller, id));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/proposals/:id/results', (req: Request, res: Response) => {
    const id = parseId(req.params.id, res);
    if (id === null) return;
    try {
      res.json(engine.getResults(id));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/proposals/:id/history', (req: Request, res: Response) => {
    const id = parseId(req.params.id, res);
    if (id === null) return;
    try {
      res.json(engine.getVotingHistory(id));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/proposals/:id/decision', (req: Request, res: Response) => {
    const id = parseId(req.params.id, res);
    if (id === null) return;
    let model: GovernanceModelName | undefined;
    if (req.query.model !== undefined) {
      const parsed = GovernanceModelParam.safeParse(req.query.model);
      if (!parsed.success) {
        res.status(400).json({ error: `Unknown governance model: ${String(req.query.model)}` });
        return;
      }
      model = parsed.data;
    }
    try {
      res.json(engine.computeDecision(id, model));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── Fractions ──

  router.get('/fractions', (_req: Request, res: Response) => {
    res.json(engine.listFractions());
  });

  router.post('/fractions', (req: Request, res: Response) => {
    const caller = callerOf(req, res);
    if (caller === null) return;
    const body = parseBody(CreateFractionBody, req, res);
    if (body === null) return;
    try {
      res.status(201).json(engine.createFraction(caller, body));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/fractions/:id', (req: Request, res: Response) => {
    const id = parseId(req.params.id, res);
    if (id === null) return;
    try {
      res.json(engine.getFraction(id));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/fractions/:id/proposals', (req: Request, res: Response) => {
    const caller = callerOf(req, res);
    if (caller === null) return;
    const id = parseId(req.params.id, res);
    if (id === null) return;
    const body = parseBody(FractionVoteBody, req, res);
    if (body === null) return;
    try {
      res.status(201).json(engine.openFractionVote(caller, id, body));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── Locks (the caller locks their own balance) ──

  router.post('/locks', (req: Request, res: Response) => {
    const caller = callerOf(req, res);
    if (caller === null) return;
    const body = parseBody(LockBody, req, res);
    if (body === null) return;
    try {
      res.status(201).json(engine.lockTokens(caller, body.shareClass, body.amount, body.unlockAt));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/locks/release', (req: Request, res: Response) => {
    const caller = callerOf(req, res);
    if (caller === null) return;
    const body = parseBody(UnlockBody, req, res);
    if (body === null) return;
    try {
      res.json({ remaining: engine.unlockTokens(caller, body.shareClass, body.amount) });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/locks/:holder/:shareClass', (req: Request, res: Response) => {
    const lock = engine.getLock(String(req.params.holder), String(req.params.shareClass));
    if (!lock) {
      res.status(404).json({ error: 'Lock not found' });
      return;
    }
    res.json(lock);
  });

  // ── Events and stats ──

  router.get('/events', (req: Request, res: Response) => {
    const kind = req.query.kind === undefined ? undefined : EventKindParam.safeParse(req.query.kind);
    if (kind && !kind.success) {
      res.status(400).json({ error: `Unknown event kind: ${String(req.query.kind)}` });
      return;
    }
    const afterSeq = req.query.after === undefined ? undefined : Number(req.query.after);
    const limit = req.query.limit === undefined ? undefined : Number(req.query.limit);
    if ((afterSeq !== undefined && !Number.isInteger(afterSeq)) || (limit !== undefined && !(Number.isInteger(limit) && limit > 0))) {
      res.status(400).json({ error: '"after" and "limit" must be integers' });
      return;
    }
    res.json(engine.listEvents({ kind: kind?.data, afterSeq, limit }));
  });

  router.get('/stats', (_req: Request, res: Response) => {
    res.json({
      proposalCount: engine.getCurrentProposalCount(),
      fractionCount: engine.listFractions().length,
      now: engine.now(),
    });
  });

  return router;
}
