/**
 * HTTP tests against an in-process server backed by the memory store and a
 * manually driven block height.
 */

import { Server } from 'http';
import jwt from 'jsonwebtoken';
import { createApp } from '../../src/app';
import { MarketBroadcaster } from '../../src/socket';
import { StoreError } from '../../src/utils/errors';
import { ALICE, BOB, buildEngine, ORACLE, OWNER, POOL, silenceConsole, TestEngine } from '../helpers/engine';

const SECRET = 'test-secret';

function tokenFor(subject: string): string {
  return jwt.sign({}, SECRET, { subject, algorithm: 'HS256', expiresIn: '5m' });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

interface ApiResponse {
  status: number;
  body: Record<string, unknown>;
}

describe('settlement API', () => {
  let ctx: TestEngine;
  let server: Server;
  let baseUrl: string;
  let events: Array<{ event: string; payload: unknown }>;

  async function call(method: string, path: string, options: { as?: string; body?: unknown } = {}): Promise<ApiResponse> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (options.as) {
      headers.Authorization = `Bearer ${tokenFor(options.as)}`;
    }
    const response = await fetch(`${baseUrl}${path}`, {
      method,
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });
    const body: unknown = await response.json();
    if (!isRecord(body)) {
      throw new Error(`Expected a JSON object from ${method} ${path}`);
    }
    return { status: response.status, body };
  }

  beforeEach(async () => {
    silenceConsole();
    ctx = buildEngine();
    events = [];
    const broadcaster = new MarketBroadcaster({
      to: () => ({
        emit(event, payload) {
          events.push({ event, payload });
          return true;
        },
      }),
    });
    const app = createApp({
      engine: ctx.engine,
      jwtSecret: SECRET,
      corsOrigin: 'http://localhost:3000',
      nodeEnv: 'test',
      broadcaster,
    });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Test server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    jest.restoreAllMocks();
  });

  it('runs a market from creation to claim', async () => {
    const created = await call('POST', '/api/v1/markets', {
      as: OWNER,
      body: { start_price: '50000', start_block: 10, end_block: 20 },
    });
    expect(created.status).toBe(201);
    expect(created.body.market_id).toBe(0);

    ctx.store.credit(ALICE, 1_000_000n);
    ctx.store.credit(BOB, 3_000_000n);
    ctx.height.setHeight(12n);

    const up = await call('POST', '/api/v1/markets/0/predictions', {
      as: ALICE,
      body: { direction: 'up', stake: '1000000' },
    });
    expect(up.status).toBe(201);
    expect(up.body.prediction).toEqual({
      market_id: 0,
      participant: ALICE,
      direction: 'up',
      stake: '1000000',
      claimed: false,
    });
    await call('POST', '/api/v1/markets/0/predictions', { as: BOB, body: { direction: 'down', stake: 3_000_000 } });

    const market = await call('GET', '/api/v1/markets/0');
    expect(market.body.market).toMatchObject({
      total_up_stake: '1000000',
      total_down_stake: '3000000',
      status: 'open',
    });

    ctx.height.setHeight(20n);
    const resolved = await call('POST', '/api/v1/markets/0/resolve', { as: ORACLE, body: { end_price: '60000' } });
    expect(resolved.status).toBe(200);
    expect(resolved.body.market).toMatchObject({ end_price: '60000', resolved: true });

    const claim = await call('POST', '/api/v1/markets/0/claim', { as: ALICE });
    expect(claim.status).toBe(200);
    expect(claim.body.payout).toBe('3920000');
    expect(claim.body.receipt).toEqual({
      market_id: 0,
      participant: ALICE,
      winnings: '4000000',
      fee: '80000',
      payout: '3920000',
    });

    const again = await call('POST', '/api/v1/markets/0/claim', { as: ALICE });
    expect(again.status).toBe(409);
    expect(again.body.error).toMatchObject({ code: 'ALREADY_CLAIMED' });

    const loser = await call('POST', '/api/v1/markets/0/claim', { as: BOB });
    expect(loser.status).toBe(400);
    expect(loser.body.error).toMatchObject({ code: 'INVALID_PREDICTION' });

    const pool = await call('GET', '/api/v1/protocol/pool-balance');
    expect(pool.body.pool_balance).toBe('0');
    expect(await ctx.store.balanceOf(POOL)).toBe(0n);

    const prediction = await call('GET', `/api/v1/markets/0/predictions/${ALICE}`);
    expect(prediction.body.prediction).toMatchObject({ claimed: true });
  });

  it('requires a valid bearer token for mutations', async () => {
    const missing = await call('POST', '/api/v1/markets', { body: { start_price: 1, start_block: 0, end_block: 1 } });
    expect(missing.status).toBe(401);
    expect(missing.body.error).toMatchObject({ code: 'UNAUTHENTICATED' });

    const forged = await fetch(`${baseUrl}/api/v1/markets`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${jwt.sign({}, 'other-secret', { subject: OWNER })}`,
      },
      body: JSON.stringify({ start_price: 1, start_block: 0, end_block: 1 }),
    });
    expect(forged.status).toBe(401);
  });

  it('reports role failures as 403 UNAUTHORIZED', async () => {
    const response = await call('POST', '/api/v1/markets', {
      as: ALICE,
      body: { start_price: 1, start_block: 0, end_block: 1 },
    });

    expect(response.status).toBe(403);
    expect(response.body.error).toEqual({ code: 'UNAUTHORIZED', message: 'Caller does not hold the owner role' });
  });

  it('groups validation failures by field', async () => {
    const response = await call('POST', '/api/v1/markets', {
      as: OWNER,
      body: { start_price: 'abc', start_block: 0, end_block: 1 },
    });

    expect(response.status).toBe(400);
    expect(response.body.error).toMatchObject({ code: 'VALIDATION_ERROR', message: 'Validation failed' });
    expect(response.body.error).toHaveProperty(['details', 'fields', 'body.start_price']);
  });

  it('maps engine errors to their codes', async () => {
    await call('POST', '/api/v1/markets', { as: OWNER, body: { start_price: 5, start_block: 10, end_block: 20 } });

    const early = await call('POST', '/api/v1/markets/0/predictions', { as: ALICE, body: { direction: 'up', stake: 100 } });
    expect(early.status).toBe(409);
    expect(early.body.error).toMatchObject({ code: 'MARKET_CLOSED' });

    ctx.height.setHeight(10n);
    const broke = await call('POST', '/api/v1/markets/0/predictions', { as: ALICE, body: { direction: 'up', stake: 100 } });
    expect(broke.status).toBe(422);
    expect(broke.body.error).toMatchObject({ code: 'INSUFFICIENT_BALANCE' });

    const sideways = await call('POST', '/api/v1/markets/0/predictions', {
      as: ALICE,
      body: { direction: 'sideways', stake: 100 },
    });
    expect(sideways.body.error).toMatchObject({ code: 'INVALID_PREDICTION' });

    const missing = await call('GET', '/api/v1/markets/9');
    expect(missing.status).toBe(404);
    expect(missing.body.error).toEqual({ code: 'NOT_FOUND', message: 'Market 9 not found' });

    const unresolved = await call('POST', '/api/v1/markets/0/claim', { as: ALICE });
    expect(unresolved.body.error).toMatchObject({ code: 'MARKET_NOT_RESOLVED' });
  });

  it('confirms a recorded stake without reading the market again', async () => {
    await call('POST', '/api/v1/markets', { as: OWNER, body: { start_price: 5, start_block: 0, end_block: 5 } });
    ctx.store.credit(ALICE, 100n);
    jest.spyOn(ctx.store, 'getMarket').mockRejectedValue(new StoreError('read markets', 'connection reset'));

    const response = await call('POST', '/api/v1/markets/0/predictions', { as: ALICE, body: { direction: 'up', stake: 100 } });

    expect(response.status).toBe(201);
    expect(await ctx.store.balanceOf(POOL)).toBe(100n);
    expect(events).toContainEqual({
      event: 'prediction_submitted',
      payload: {
        prediction: { market_id: 0, participant: ALICE, direction: 'up', stake: '100', claimed: false },
        market: {
          id: 0,
          start_price: '5',
          end_price: '0',
          total_up_stake: '100',
          total_down_stake: '0',
          start_block: '0',
          end_block: '5',
          resolved: false,
        },
      },
    });
  });

  it('rejects market ids that are not plain decimals', async () => {
    await call('POST', '/api/v1/markets', { as: OWNER, body: { start_price: 5, start_block: 0, end_block: 5 } });

    const exponent = await call('GET', '/api/v1/markets/1e0');
    expect(exponent.status).toBe(400);
    expect(exponent.body.error).toMatchObject({ code: 'VALIDATION_ERROR' });

    const blank = await call('GET', '/api/v1/markets/%20');
    expect(blank.status).toBe(400);
  });

  it('lists markets with their status and pagination', async () => {
    await call('POST', '/api/v1/markets', { as: OWNER, body: { start_price: 5, start_block: 0, end_block: 5 } });
    await call('POST', '/api/v1/markets', { as: OWNER, body: { start_price: 5, start_block: 3, end_block: 9 } });

    const response = await call('GET', '/api/v1/markets?status=open&limit=10');

    expect(response.status).toBe(200);
    expect(response.body.height).toBe('0');
    expect(response.body.markets).toEqual([
      {
        id: 0,
        start_price: '5',
        end_price: '0',
        total_up_stake: '0',
        total_down_stake: '0',
        start_block: '0',
        end_block: '5',
        resolved: false,
        status: 'open',
      },
    ]);
    expect(response.body.pagination).toEqual({ page: 1, limit: 10, total: 1, totalPages: 1 });
  });

  it('quotes a hypothetical payout', async () => {
    await call('POST', '/api/v1/markets', { as: OWNER, body: { start_price: 5, start_block: 0, end_block: 5 } });
    ctx.store.credit(BOB, 300n);
    await call('POST', '/api/v1/markets/0/predictions', { as: BOB, body: { direction: 'down', stake: 300 } });

    const response = await call('GET', '/api/v1/markets/0/quote?direction=up&stake=100');

    // 100 * 400 / 100 = 400, fee 8
    expect(response.body.quote).toEqual({
      market_id: 0,
      direction: 'up',
      stake: '100',
      winnings: '400',
      fee: '8',
      payout: '392',
    });
  });

  it('exposes owner-only protocol administration', async () => {
    const denied = await call('PUT', '/api/v1/protocol/fee-percentage', { as: ALICE, body: { fee_percent: 5 } });
    expect(denied.status).toBe(403);

    const tooHigh = await call('PUT', '/api/v1/protocol/fee-percentage', { as: OWNER, body: { fee_percent: 150 } });
    expect(tooHigh.status).toBe(400);
    expect(tooHigh.body.error).toMatchObject({ code: 'INVALID_PARAMETER' });

    await call('PUT', '/api/v1/protocol/fee-percentage', { as: OWNER, body: { fee_percent: 5 } });
    await call('PUT', '/api/v1/protocol/minimum-stake', { as: OWNER, body: { minimum_stake: '250' } });
    await call('PUT', '/api/v1/protocol/oracle', { as: OWNER, body: { oracle_id: 'oracle-2' } });

    const protocol = await call('GET', '/api/v1/protocol');
    expect(protocol.body.protocol).toEqual({
      owner_id: OWNER,
      oracle_id: 'oracle-2',
      minimum_stake: '250',
      fee_percent: 5,
      next_market_id: 0,
    });

    ctx.store.credit(POOL, 50n);
    const withdrawal = await call('POST', '/api/v1/protocol/withdraw-fees', { as: OWNER, body: { amount: '20' } });
    expect(withdrawal.body.withdrawal).toEqual({ amount: '20', recipient: OWNER, pool_balance: '30' });

    const overdraw = await call('POST', '/api/v1/protocol/withdraw-fees', { as: OWNER, body: { amount: '31' } });
    expect(overdraw.status).toBe(422);
  });

  it('answers unknown routes with 404', async () => {
    const response = await call('GET', '/api/v1/nowhere');

    expect(response.status).toBe(404);
    expect(response.body.error).toEqual({ code: 'NOT_FOUND', message: 'Endpoint not found' });
  });
});
