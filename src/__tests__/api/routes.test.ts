import request from 'supertest';
import { createApp } from '../../api/server';
import { DashboardCache } from '../../services/dashboardCache';
import { LedgerSource } from '../../services/ledgerClient';
import { checkingOnly, householdGroups, householdLedger } from '../fixtures/ledger';

function createCache(): { cache: DashboardCache; fetchSnapshot: jest.Mock } {
  const fetchSnapshot = jest.fn(async () => structuredClone(householdLedger));
  const source: LedgerSource = { fetchSnapshot };
  const cache = new DashboardCache(source, {
    accountGroups: householdGroups,
    now: () => new Date('2024-06-15T12:00:00Z'),
  });
  return { cache, fetchSnapshot };
}

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => {});
  jest.spyOn(console, 'warn').mockImplementation(() => {});
  jest.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('GET /api', () => {
  it('should return API information', async () => {
    const response = await request(createApp(createCache().cache)).get('/api');

    expect(response.status).toBe(200);
    expect(response.body.message).toBe('Ledger Dashboard API');
    expect(response.body.endpoints.dashboard).toBeDefined();
    expect(response.body.endpoints.aggregate).toBeDefined();
  });
});

describe('GET /api/health', () => {
  it('should return status ok with timestamp', async () => {
    const response = await request(createApp(createCache().cache)).get('/api/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('ok');
    expect(response.body.timestamp).toBeDefined();
  });
});

describe('GET /api/dashboard', () => {
  it('should return the empty snapshot before the first load', async () => {
    const response = await request(createApp(createCache().cache)).get('/api/dashboard');

    expect(response.status).toBe(200);
    expect(response.body.origin).toBe('empty');
    expect(response.body.lastUpdated).toBeNull();
    expect(response.body.aggregate.netWorthByMonth).toEqual({});
  });

  it('should return the refreshed aggregate and summary', async () => {
    const { cache } = createCache();
    await cache.refresh();

    const response = await request(createApp(cache)).get('/api/dashboard');

    expect(response.status).toBe(200);
    expect(response.body.origin).toBe('api');
    expect(response.body.lastUpdated).toBe('2024-06-15T12:00:00.000Z');
    expect(response.body.accountGroups).toEqual(householdGroups);
    expect(response.body.summary.latestMonth).toBe('2024-03');
    expect(response.body.summary.currentAssets).toBe(19050);
  });
});

describe('time series endpoints', () => {
  it('should serve net worth, cash flow and metrics', async () => {
    const { cache } = createCache();
    await cache.refresh();
    const app = createApp(cache);

    const netWorth = await request(app).get('/api/net-worth');
    const cashFlow = await request(app).get('/api/cash-flow');
    const metrics = await request(app).get('/api/metrics');

    expect(netWorth.body['2024-02']).toEqual({
      assets_liquid: 6500,
      assets_investment: 0,
      liabilities_revolving: 0,
    });
    expect(cashFlow.body['2024-02']).toEqual({ income: 0, expenses: 1500, net: -1500 });
    expect(metrics.body.savingsRate).toHaveLength(3);
    expect(metrics.body.savingsRate[1]).toBe(0);
  });
});

describe('POST /api/refresh', () => {
  it('should accept the request and start a refresh', async () => {
    const { cache, fetchSnapshot } = createCache();

    const response = await request(createApp(cache)).post('/api/refresh');

    expect(response.status).toBe(202);
    expect(response.body).toEqual({ status: 'refreshing' });
    expect(fetchSnapshot).toHaveBeenCalledTimes(1);
    await cache.refresh();
    expect(cache.getSnapshot().origin).toBe('api');
  });
});

describe('POST /api/aggregate', () => {
  it('should aggregate the ledger in the body', async () => {
    const { cache, fetchSnapshot } = createCache();

    const response = await request(createApp(cache)).post('/api/aggregate').send(checkingOnly);

    expect(response.status).toBe(200);
    expect(response.body.aggregate.netWorthByMonth).toEqual({
      '2024-01': { assets_liquid: 5000 },
      '2024-02': { assets_liquid: 4900 },
    });
    expect(response.body.aggregate.cashFlowByMonth).toEqual({
      '2024-02': { income: 0, expenses: 100, net: -100 },
    });
    expect(response.body.aggregate.metrics.savingsRate).toEqual([0]);
    expect(response.body.summary.groupBalances).toEqual([
      { group: 'assets_liquid', label: 'Assets Liquid', balance: 4900 },
    ]);
    expect(fetchSnapshot).not.toHaveBeenCalled();
  });

  it('should return 400 for an empty body', async () => {
    const response = await request(createApp(createCache().cache)).post('/api/aggregate').send({});

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('Invalid aggregation request');
    expect(response.body.issues).toContain('accounts: Required');
  });

  it('should return 400 for overlapping account groups', async () => {
    const response = await request(createApp(createCache().cache))
      .post('/api/aggregate')
      .send({ ...checkingOnly, accountGroups: { assets_liquid: ['Checking'], assets_restricted: ['Checking'] } });

    expect(response.status).toBe(400);
    expect(response.body.issues).toEqual(['accountGroups: Accounts listed in more than one group: Checking']);
  });

  it('should return 400 for malformed JSON', async () => {
    const response = await request(createApp(createCache().cache))
      .post('/api/aggregate')
      .set('Content-Type', 'application/json')
      .send('{"accounts":');

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('Request error');
  });
});
