import Fastify, { type FastifyReply, type FastifyRequest } from "fastify";
import {
  createLedger,
  SqliteKeyValueBackend,
  type AccountId,
  type AssetId,
  type KeyValueBackend,
  type LedgerErrorCode,
  type LedgerEvent as CoreLedgerEvent,
} from "@tokenledger/ledger-core";
import type {
  BurnResponse,
  CreateAssetResponse,
  GetAssetResponse,
  GetAuditResponse,
  GetBalanceResponse,
  GetUniqueAssetResponse,
  ListEventsResponse,
  ListHoldersResponse,
  MintAssetResponse,
  MintUniqueResponse,
  RegistryName,
  SetMetadataResponse,
  TransferResponse,
} from "@tokenledger/shared";
import {
  ACCOUNT_ID_HEADER,
  isServiceAuthAuthorized,
  parseAccountAuthMode,
  parseAccountHeader,
  SERVICE_AUTH_HEADER,
  verifySignedAccount,
  type AccountAuthMode,
} from "@tokenledger/shared";
import { buildOpenApiSpec } from "./openapi.js";
import { AccountNonceStore } from "./storage/account-nonce-store.js";
import { SqliteEventLogStore, type EventLogStore } from "./storage/event-log-store.js";
import {
  parseHexBytes,
  parseU128,
  toAssetView,
  toAuditView,
  toHoldingView,
  toUniqueAssetView,
  toWireEvent,
} from "./wire.js";

const DEFAULT_LEDGER_DB_PATH = "data/ledger-service.db";
const DEFAULT_EVENT_PAGE = 100;
const MAX_EVENT_PAGE = 500;

const LEDGER_ERROR_RESPONSES: Record<LedgerErrorCode, { status: number; error: string; message: string }> = {
  Unknown: { status: 404, error: "asset_not_found", message: "Asset does not exist" },
  NoPermission: { status: 403, error: "no_permission", message: "Caller does not own the asset" },
  NotOwned: { status: 409, error: "not_owned", message: "Caller holds none of the asset" },
  NoSupply: { status: 400, error: "no_supply", message: "Initial supply must be greater than zero" },
  TypeOverflow: { status: 409, error: "id_space_exhausted", message: "No asset ids left to allocate" },
};

interface AssetParams {
  assetId: string;
}

interface BalanceParams extends AssetParams {
  account: string;
}

interface EventsQuery {
  registry?: string;
  assetId?: string;
  after?: string;
  limit?: string;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isRegistryName(value: unknown): value is RegistryName {
  return value === "assets" || value === "uniques";
}

function parseCursor(value: string | undefined): number | null {
  if (value === undefined) return 0;
  if (!/^\d{1,15}$/.test(value)) return null;
  return Number(value);
}

function parseMetadataRequest(body: unknown): { name: Uint8Array; symbol: Uint8Array } | null {
  if (!isObject(body)) return null;
  const name = parseHexBytes(body.name);
  const symbol = parseHexBytes(body.symbol);
  if (!name || !symbol) return null;
  return { name, symbol };
}

function parseAmountRequest(body: unknown): { amount: bigint } | null {
  if (!isObject(body)) return null;
  const amount = parseU128(body.amount);
  if (amount === null) return null;
  return { amount };
}

function parseAmountToRequest(body: unknown): { amount: bigint; to: AccountId } | null {
  const parsed = parseAmountRequest(body);
  if (!parsed || !isObject(body) || !isNonEmptyString(body.to)) return null;
  return { amount: parsed.amount, to: body.to.trim() };
}

function parseMintUniqueRequest(body: unknown): { metadata: Uint8Array; supply: bigint } | null {
  if (!isObject(body)) return null;
  const metadata = parseHexBytes(body.metadata);
  const supply = parseU128(body.supply);
  if (!metadata || supply === null) return null;
  return { metadata, supply };
}

function sendLedgerError(reply: FastifyReply, code: LedgerErrorCode) {
  const mapped = LEDGER_ERROR_RESPONSES[code];
  return reply.code(mapped.status).send({ error: mapped.error, code, message: mapped.message });
}

function sendInvalid(reply: FastifyReply, message: string) {
  return reply.code(400).send({ error: "invalid_request", message });
}

function wireEvents(events: CoreLedgerEvent[]) {
  return events.map(toWireEvent);
}

export interface BuildServerOptions {
  dbPath?: string;
  backend?: KeyValueBackend;
  eventLog?: EventLogStore;
  serviceAuthToken?: string;
  authMode?: AccountAuthMode;
  logLevel?: string;
  serviceBaseUrl?: string;
  maxAssetId?: bigint;
  maxUniqueAssetId?: bigint;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const app = Fastify({ logger: { level: options.logLevel || process.env.LOG_LEVEL || "info" } });
  const dbPath = options.dbPath || process.env.LEDGER_DB_PATH || DEFAULT_LEDGER_DB_PATH;
  let backend: KeyValueBackend;
  let eventLog: EventLogStore;
  if (options.backend) {
    backend = options.backend;
    eventLog = options.eventLog || new SqliteEventLogStore(dbPath);
  } else {
    const sqlite = new SqliteKeyValueBackend(dbPath);
    backend = sqlite;
    eventLog = options.eventLog || new SqliteEventLogStore(sqlite.connection);
  }
  const ownBackend = !options.backend;
  const ownEventLog = !options.eventLog;
  const nonces = new AccountNonceStore(backend);
  const serviceAuthToken = options.serviceAuthToken ?? process.env.SERVICE_AUTH_TOKEN;
  const authMode = options.authMode ?? parseAccountAuthMode(process.env.AUTH_MODE);
  const serviceBaseUrl =
    options.serviceBaseUrl ||
    process.env.SERVICE_BASE_URL ||
    `http://127.0.0.1:${process.env.PORT || 4110}`;

  const { assets, uniques } = createLedger({
    backend,
    sink: eventLog,
    logger: app.log,
    maxAssetId: options.maxAssetId,
    maxUniqueAssetId: options.maxUniqueAssetId,
  });

  async function authenticate(req: FastifyRequest): Promise<AccountId | null> {
    if (!isServiceAuthAuthorized(req.headers[SERVICE_AUTH_HEADER], serviceAuthToken)) {
      return null;
    }
    if (authMode === "signature") {
      const signed = await verifySignedAccount(req.headers, {
        method: req.method,
        url: req.url,
        body: req.body,
      });
      const nonce = signed ? parseU128(signed.nonce) : null;
      if (!signed || nonce === null || !nonces.accept(signed.account, nonce)) {
        return null;
      }
      return signed.account;
    }
    return parseAccountHeader(req.headers[ACCOUNT_ID_HEADER]);
  }

  async function requireAccount(req: FastifyRequest, reply: FastifyReply): Promise<AccountId | null> {
    const account = await authenticate(req);
    if (!account) {
      reply.code(401).send({
        error: "unauthenticated",
        message:
          authMode === "signature"
            ? "Missing or invalid account signature, or a nonce that was already used"
            : `Missing '${ACCOUNT_ID_HEADER}' header or invalid '${SERVICE_AUTH_HEADER}'`,
      });
    }
    return account;
  }

  // signed callers are lower-cased public keys; recipients must match that form
  function recipient(to: AccountId): AccountId {
    return authMode === "signature" ? to.toLowerCase() : to;
  }

  function assetIdParam(params: AssetParams): AssetId | null {
    return parseU128(params.assetId);
  }

  app.get("/health", async () => ({ ok: true, service: "ledger-service" }));
  app.get("/openapi.json", async () => buildOpenApiSpec(serviceBaseUrl));

  app.post("/assets", async (req, reply) => {
    const caller = await requireAccount(req, reply);
    if (!caller) return reply;

    const result = assets.create(caller);
    if (!result.ok) return sendLedgerError(reply, result.error);
    const response: CreateAssetResponse = {
      assetId: result.value.toString(),
      events: wireEvents(result.events),
    };
    return reply.code(201).send(response);
  });

  app.put<{ Params: AssetParams }>("/assets/:assetId/metadata", async (req, reply) => {
    const caller = await requireAccount(req, reply);
    if (!caller) return reply;

    const assetId = assetIdParam(req.params);
    const parsed = parseMetadataRequest(req.body);
    if (assetId === null || !parsed) {
      return sendInvalid(reply, "Expected assetId param and hex name and symbol fields");
    }

    const result = assets.setMetadata(caller, assetId, parsed.name, parsed.symbol);
    if (!result.ok) return sendLedgerError(reply, result.error);
    const response: SetMetadataResponse = {
      assetId: result.value.toString(),
      events: wireEvents(result.events),
    };
    return response;
  });

  app.post<{ Params: AssetParams }>("/assets/:assetId/mint", async (req, reply) => {
    const caller = await requireAccount(req, reply);
    if (!caller) return reply;

    const assetId = assetIdParam(req.params);
    const parsed = parseAmountToRequest(req.body);
    if (assetId === null || !parsed) {
      return sendInvalid(reply, "Expected assetId param, decimal amount and recipient");
    }

    const result = assets.mint(caller, assetId, parsed.amount, recipient(parsed.to));
    if (!result.ok) return sendLedgerError(reply, result.error);
    const response: MintAssetResponse = {
      assetId: result.value.assetId.toString(),
      totalSupply: result.value.totalSupply.toString(),
      minted: result.value.minted.toString(),
      events: wireEvents(result.events),
    };
    return response;
  });

  app.post<{ Params: AssetParams }>("/assets/:assetId/burn", async (req, reply) => {
    const caller = await requireAccount(req, reply);
    if (!caller) return reply;

    const assetId = assetIdParam(req.params);
    const parsed = parseAmountRequest(req.body);
    if (assetId === null || !parsed) {
      return sendInvalid(reply, "Expected assetId param and decimal amount");
    }

    const result = assets.burn(caller, assetId, parsed.amount);
    if (!result.ok) return sendLedgerError(reply, result.error);
    const response: BurnResponse = {
      assetId: result.value.assetId.toString(),
      totalSupply: result.value.totalSupply.toString(),
      burned: result.value.burned.toString(),
      events: wireEvents(result.events),
    };
    return response;
  });

  app.post<{ Params: AssetParams }>("/assets/:assetId/transfer", async (req, reply) => {
    const caller = await requireAccount(req, reply);
    if (!caller) return reply;

    const assetId = assetIdParam(req.params);
    const parsed = parseAmountToRequest(req.body);
    if (assetId === null || !parsed) {
      return sendInvalid(reply, "Expected assetId param, decimal amount and recipient");
    }

    const result = assets.transfer(caller, assetId, parsed.amount, recipient(parsed.to));
    if (!result.ok) return sendLedgerError(reply, result.error);
    const response: TransferResponse = {
      assetId: result.value.assetId.toString(),
      transferred: result.value.transferred.toString(),
      events: wireEvents(result.events),
    };
    return response;
  });

  app.get<{ Params: AssetParams }>("/assets/:assetId", async (req, reply) => {
    const assetId = assetIdParam(req.params);
    if (assetId === null) return sendInvalid(reply, "Expected decimal assetId param");
    const details = assets.asset(assetId);
    if (!details) return sendLedgerError(reply, "Unknown");
    const response: GetAssetResponse = {
      asset: toAssetView(assetId, details, assets.metadata(assetId)),
    };
    return response;
  });

  app.get<{ Params: BalanceParams }>("/assets/:assetId/balances/:account", async (req, reply) => {
    const assetId = assetIdParam(req.params);
    if (assetId === null) return sendInvalid(reply, "Expected decimal assetId param");
    if (!assets.asset(assetId)) return sendLedgerError(reply, "Unknown");
    const response: GetBalanceResponse = {
      assetId: assetId.toString(),
      account: req.params.account,
      balance: assets.balanceOf(assetId, req.params.account).toString(),
    };
    return response;
  });

  app.get<{ Params: AssetParams }>("/assets/:assetId/holders", async (req, reply) => {
    const assetId = assetIdParam(req.params);
    if (assetId === null) return sendInvalid(reply, "Expected decimal assetId param");
    if (!assets.asset(assetId)) return sendLedgerError(reply, "Unknown");
    const response: ListHoldersResponse = {
      assetId: assetId.toString(),
      holders: assets.holders(assetId).map(toHoldingView),
    };
    return response;
  });

  app.get<{ Params: AssetParams }>("/assets/:assetId/audit", async (req, reply) => {
    const assetId = assetIdParam(req.params);
    if (assetId === null) return sendInvalid(reply, "Expected decimal assetId param");
    const audit = assets.audit(assetId);
    if (!audit) return sendLedgerError(reply, "Unknown");
    const response: GetAuditResponse = { audit: toAuditView(audit) };
    return response;
  });

  app.post("/uniques", async (req, reply) => {
    const caller = await requireAccount(req, reply);
    if (!caller) return reply;

    const parsed = parseMintUniqueRequest(req.body);
    if (!parsed) {
      return sendInvalid(reply, "Expected hex metadata and decimal supply");
    }

    const result = uniques.mint(caller, parsed.metadata, parsed.supply);
    if (!result.ok) return sendLedgerError(reply, result.error);
    const response: MintUniqueResponse = {
      assetId: result.value.assetId.toString(),
      supply: result.value.supply.toString(),
      events: wireEvents(result.events),
    };
    return reply.code(201).send(response);
  });

  app.post<{ Params: AssetParams }>("/uniques/:assetId/burn", async (req, reply) => {
    const caller = await requireAccount(req, reply);
    if (!caller) return reply;

    const assetId = assetIdParam(req.params);
    const parsed = parseAmountRequest(req.body);
    if (assetId === null || !parsed) {
      return sendInvalid(reply, "Expected assetId param and decimal amount");
    }

    const result = uniques.burn(caller, assetId, parsed.amount);
    if (!result.ok) return sendLedgerError(reply, result.error);
    const response: BurnResponse = {
      assetId: result.value.assetId.toString(),
      totalSupply: result.value.totalSupply.toString(),
      burned: result.value.burned.toString(),
      events: wireEvents(result.events),
    };
    return response;
  });

  app.post<{ Params: AssetParams }>("/uniques/:assetId/transfer", async (req, reply) => {
    const caller = await requireAccount(req, reply);
    if (!caller) return reply;

    const assetId = assetIdParam(req.params);
    const parsed = parseAmountToRequest(req.body);
    if (assetId === null || !parsed) {
      return sendInvalid(reply, "Expected assetId param, decimal amount and recipient");
    }

    const result = uniques.transfer(caller, assetId, parsed.amount, recipient(parsed.to));
    if (!result.ok) return sendLedgerError(reply, result.error);
    const response: TransferResponse = {
      assetId: result.value.assetId.toString(),
      transferred: result.value.transferred.toString(),
      events: wireEvents(result.events),
    };
    return response;
  });

  app.get<{ Params: AssetParams }>("/uniques/:assetId", async (req, reply) => {
    const assetId = assetIdParam(req.params);
    if (assetId === null) return sendInvalid(reply, "Expected decimal assetId param");
    const details = uniques.asset(assetId);
    if (!details) return sendLedgerError(reply, "Unknown");
    const response: GetUniqueAssetResponse = { asset: toUniqueAssetView(assetId, details) };
    return response;
  });

  app.get<{ Params: BalanceParams }>("/uniques/:assetId/balances/:account", async (req, reply) => {
    const assetId = assetIdParam(req.params);
    if (assetId === null) return sendInvalid(reply, "Expected decimal assetId param");
    if (!uniques.asset(assetId)) return sendLedgerError(reply, "Unknown");
    const response: GetBalanceResponse = {
      assetId: assetId.toString(),
      account: req.params.account,
      balance: uniques.balanceOf(assetId, req.params.account).toString(),
    };
    return response;
  });

  app.get<{ Params: AssetParams }>("/uniques/:assetId/holders", async (req, reply) => {
    const assetId = assetIdParam(req.params);
    if (assetId === null) return sendInvalid(reply, "Expected decimal assetId param");
    if (!uniques.asset(assetId)) return sendLedgerError(reply, "Unknown");
    const response: ListHoldersResponse = {
      assetId: assetId.toString(),
      holders: uniques.holders(assetId).map(toHoldingView),
    };
    return response;
  });

  app.get<{ Params: AssetParams }>("/uniques/:assetId/audit", async (req, reply) => {
    const assetId = assetIdParam(req.params);
    if (assetId === null) return sendInvalid(reply, "Expected decimal assetId param");
    const audit = uniques.audit(assetId);
    if (!audit) return sendLedgerError(reply, "Unknown");
    const response: GetAuditResponse = { audit: toAuditView(audit) };
    return response;
  });

  app.get<{ Querystring: EventsQuery }>("/events", async (req, reply) => {
    const { registry, assetId, after, limit } = req.query;
    if (registry !== undefined && !isRegistryName(registry)) {
      return sendInvalid(reply, "registry must be 'assets' or 'uniques'");
    }
    const assetFilter = assetId === undefined ? undefined : parseU128(assetId);
    if (assetFilter === null) {
      return sendInvalid(reply, "assetId must be a decimal asset id");
    }
    const cursor = parseCursor(after);
    const pageSize = limit === undefined ? DEFAULT_EVENT_PAGE : parseCursor(limit);
    if (cursor === null || pageSize === null || pageSize < 1 || pageSize > MAX_EVENT_PAGE) {
      return sendInvalid(reply, `after must be a sequence number and limit within 1..${MAX_EVENT_PAGE}`);
    }

    const events = eventLog.list({
      registry,
      assetId: assetFilter?.toString(),
      after: cursor,
      limit: pageSize,
    });
    const last = events[events.length - 1];
    const response: ListEventsResponse = {
      events,
      ...(last && events.length === pageSize ? { nextCursor: last.seq } : {}),
    };
    return response;
  });

  app.addHook("onClose", async () => {
    if (ownEventLog) {
      eventLog.close();
    }
    if (ownBackend) {
      backend.close();
    }
  });

  return app;
}
