import { createServer, type Server as HttpServer } from 'node:http';
import { resolve } from 'node:path';
import { existsSync, mkdirSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import express, { type Express } from 'express';

import { engineDefaults, loadConfigFile, parseConfig } from '../engine/config-loader.js';
import { OperatorAccessControl } from '../engine/access-control.js';
import { InMemoryBalanceLedger } from '../engine/balance-ledger.js';
import type { Clock } from '../engine/clock.js';
import { GovernanceEngine } from '../engine/governance-engine.js';
import { createDb, DbStore } from './db.js';
import { createApiRouter } from './api.js';
import { setupWebSocket } from './ws.js';
import { createAuth } from './auth.js';
import type { GovernanceConfig } from '../shared/types.js';

const PORT = parseInt(process.env.PORT ?? '3000', 10);
const HOST = process.env.HOST ?? '0.0.0.0';
const DB_PATH = process.env.DB_PATH ?? './data/sharevote.db';
const CONFIG_PATH = process.env.CONFIG_PATH;

// ── createApp factory ──

export interface CreateAppOptions {
  dbPath: string;
  config: GovernanceConfig;
  /** Defaults to wall-clock seconds. Tests pass a ManualClock. */
  clock?: Clock;
}

export interface GovernanceApp {
  app: Express;
  httpServer: HttpServer;
  engine: GovernanceEngine;
  ledger: InMemoryBalanceLedger;
  store: DbStore;
  close: () => Promise<void>;
}

export function createApp(opts: CreateAppOptions): GovernanceApp {
  const { governance } = opts.config;
  const { db, sqlite } = createDb(opts.dbPath);
  const store = new DbStore(db);

  // Balances are seeded fresh on every start; holds for persisted locks are put back
  const ledger = InMemoryBalanceLedger.fromSeed(governance.ledger.share_classes);
  const engine = new GovernanceEngine({
    store,
    ledger,
    access: new OperatorAccessControl(governance.operators),
    clock: opts.clock,
    defaults: engineDefaults(opts.config),
  });
  const cut = engine.restoreLocks();
  if (cut.length > 0) {
    console.log(`[SHAREVOTE] ${cut.length} persisted lock(s) cut to current balances`);
  }

  // ── Express ──
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  // ── Auth ──
  const auth = createAuth(governance.api_tokens);

  // Non-blocking: only sets req.caller
  app.use(auth.authenticate);

  // Health endpoint is public
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', name: governance.name, uptime: process.uptime() });
  });

  app.use('/api', auth.protect, createApiRouter(engine));

  // ── HTTP + WebSocket ──
  const httpServer = createServer(app);
  const { wss, detach } = setupWebSocket(httpServer, engine, governance.name);

  const close = (): Promise<void> => {
    detach();
    for (const client of wss.clients) client.terminate();
    wss.close();
    if (!httpServer.listening) {
      sqlite.close();
      return Promise.resolve();
    }
    return new Promise((resolvePromise, reject) => {
      httpServer.close((err) => {
        sqlite.close();
        if (err) reject(err);
        else resolvePromise();
      });
    });
  };

  return { app, httpServer, engine, ledger, store, close };
}

// ── main ──

const DEV_CONFIG = `
version: "1"
governance:
  name: "Development Governance"
  description: "Default development setup"
  operators: [ops]
  defaults:
    share_class: GOV
    model: simple_majority
    weighting: one_per_holder
  api_tokens:
    - identity: ops
      token: dev-ops-token
    - identity: alice
      token: dev-alice-token
    - identity: bob
      token: dev-bob-token
  ledger:
    share_classes:
      - id: GOV
        holders: { alice: 60, bob: 40 }
`;

function main(): void {
  console.log('[SHAREVOTE] Starting governance server...');

  // ── Database directory ──
  const dbDir = resolve(DB_PATH, '..');
  if (!existsSync(dbDir)) {
    mkdirSync(dbDir, { recursive: true });
  }

  // ── Config ──
  let config: GovernanceConfig;
  if (CONFIG_PATH) {
    config = loadConfigFile(CONFIG_PATH);
    console.log(`[SHAREVOTE] Loaded config from ${CONFIG_PATH}: "${config.governance.name}"`);
  } else {
    config = parseConfig(DEV_CONFIG);
    console.log('[SHAREVOTE] Using default development config');
  }

  const governance = createApp({ dbPath: DB_PATH, config });

  console.log(`[SHAREVOTE] Operators: ${config.governance.operators.join(', ')}`);
  for (const shareClass of config.governance.ledger.share_classes) {
    console.log(`[SHAREVOTE]   ${shareClass.id}: ${governance.ledger.totalMinted(shareClass.id)} minted`);
  }
  console.log(`[SHAREVOTE] Proposals on record: ${governance.engine.getCurrentProposalCount()}`);

  governance.httpServer.listen(PORT, HOST, () => {
    console.log(`[SHAREVOTE] Server listening on http://${HOST}:${PORT}`);
    console.log(`[SHAREVOTE] REST API: http://${HOST}:${PORT}/api`);
    console.log(`[SHAREVOTE] WebSocket: ws://${HOST}:${PORT}/ws`);
  });
}

// Only run main() when this file is the entry point (not when imported by tests)
const isEntryPoint =
  process.argv[1] === fileURLToPath(import.meta.url) ||
  process.argv[1]?.endsWith('/dist/server/index.js');

if (isEntryPoint) {
  try {
    main();
  } catch (err) {
    console.error('[SHAREVOTE] Fatal error:', err);
    process.exit(1);
  }
}
