import { LedgerApiError, LedgerClient, buildQueryString } from '../../services/ledgerClient';
import { computeNetWorthByMonth } from '../../engine/netWorth';
import { checkingOnly } from '../fixtures/ledger';

function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function createClient(responses: Record<string, Response | Error>) {
  const fetchImpl = jest.fn<Promise<Response>, Parameters<typeof fetch>>(async (input) => {
    const url = String(input);
    const path = url.replace('http://ledger.test', '');
    const response = responses[path];
    if (response === undefined) {
      return jsonResponse({ error: 'not found' }, 404);
    }
    if (response instanceof Error) {
      throw response;
    }
    return response;
  });
  const client = new LedgerClient({ baseUrl: 'http://ledger.test/', apiKey: 'test-key', fetchImpl });
  return { client, fetchImpl };
}

describe('buildQueryString', () => {
  it('should drop empty values and encode the rest', () => {
    expect(buildQueryString({ since: '2024-01-01', account: undefined, note: 'a b&c', limit: 10, x: null })).toBe(
      'since=2024-01-01&note=a%20b%26c&limit=10'
    );
  });

  it('should return an empty string for no params', () => {
    expect(buildQueryString()).toBe('');
  });
});

describe('LedgerClient', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  it('should send the bearer token and JSON content type', async () => {
    const { client, fetchImpl } = createClient({ '/accounts': jsonResponse(checkingOnly.accounts) });

    await client.getAccounts();

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0][0]).toBe('http://ledger.test/accounts');
    expect(fetchImpl.mock.calls[0][1]).toEqual({
      headers: { authorization: 'Bearer test-key', 'content-type': 'application/json' },
    });
  });

  it('should unwrap a data envelope', async () => {
    const { client } = createClient({ '/categories': jsonResponse({ data: checkingOnly.categories }) });

    await expect(client.getCategories()).resolves.toEqual([{ id: 'c1', is_income: false }]);
  });

  it('should append transaction query params', async () => {
    const { client, fetchImpl } = createClient({
      '/transactions?since=2024-01-01': jsonResponse(checkingOnly.transactions),
    });

    const transactions = await client.getTransactions({ since: '2024-01-01', account: undefined });

    expect(fetchImpl.mock.calls[0][0]).toBe('http://ledger.test/transactions?since=2024-01-01');
    expect(transactions.map((tx) => tx.id)).toEqual(['t1', 't2']);
  });

  it('should raise LedgerApiError on non-2xx responses', async () => {
    const { client } = createClient({ '/payees': jsonResponse({ error: 'unauthorized' }, 401) });

    const error = await client.getPayees().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(LedgerApiError);
    if (error instanceof LedgerApiError) {
      expect(error.status).toBe(401);
      expect(error.body).toEqual({ error: 'unauthorized' });
    }
  });

  it('should raise LedgerApiError on invalid payloads', async () => {
    const { client } = createClient({ '/accounts': jsonResponse([{ id: 1 }]) });

    const error = await client.getAccounts().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(LedgerApiError);
    if (error instanceof LedgerApiError) {
      expect(error.status).toBeNull();
      expect(error.message).toContain('GET /accounts returned an invalid payload');
    }
  });

  it('should propagate network failures', async () => {
    const { client } = createClient({ '/accounts': new Error('connect ECONNREFUSED') });

    await expect(client.getAccounts()).rejects.toThrow('connect ECONNREFUSED');
  });

  it('should fetch a full snapshot', async () => {
    const { client } = createClient({
      '/accounts': jsonResponse(checkingOnly.accounts),
      '/categories': jsonResponse(checkingOnly.categories),
      '/payees': jsonResponse([{ id: 'p1', name: 'Grocer' }]),
      '/transactions': jsonResponse(checkingOnly.transactions),
    });

    const snapshot = await client.fetchSnapshot();

    expect(snapshot.accounts).toEqual(checkingOnly.accounts);
    expect(snapshot.payees).toEqual([{ id: 'p1', name: 'Grocer' }]);
    expect(snapshot.transactions).toHaveLength(2);
  });

  it('should pass budget month and net worth payloads through', async () => {
    const { client, fetchImpl } = createClient({
      '/budget/2024-02': jsonResponse({ month: '2024-02', toBudget: 1200 }),
      '/net-worth': jsonResponse({ total: 123456 }),
    });

    await expect(client.getBudgetMonth('2024-02')).resolves.toEqual({ month: '2024-02', toBudget: 1200 });
    await expect(client.getNetWorth()).resolves.toEqual({ total: 123456 });
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it('should report health as a boolean', async () => {
    const healthy = createClient({ '/health': jsonResponse({ status: 'ok' }) });
    const unhealthy = createClient({ '/health': jsonResponse({}, 503) });
    const unreachable = createClient({ '/health': new Error('timeout') });

    await expect(healthy.client.checkHealth()).resolves.toBe(true);
    await expect(unhealthy.client.checkHealth()).resolves.toBe(false);
    await expect(unreachable.client.checkHealth()).resolves.toBe(false);
  });

  it('should re-check health on the interval until stopped', () => {
    jest.useFakeTimers();
    const { client, fetchImpl } = createClient({ '/health': jsonResponse({ status: 'ok' }) });

    const stop = client.monitorHealth(1000);
    expect(fetchImpl).toHaveBeenCalledTimes(1);

    jest.advanceTimersByTime(2000);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(fetchImpl.mock.calls[2][0]).toBe('http://ledger.test/health');

    stop();
    jest.advanceTimersByTime(5000);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it('should load transactions with a null amount and count them as 0', async () => {
    const { client } = createClient({
      '/accounts': jsonResponse(checkingOnly.accounts),
      '/categories': jsonResponse(checkingOnly.categories),
      '/payees': jsonResponse([]),
      '/transactions': jsonResponse([
        { id: 't1', account: '1', amount: 100000, date: '2024-01-10', category: null, transfer_id: null },
        { id: 't2', account: '1', amount: null, date: '2024-02-10', category: 'c1', transfer_id: null },
      ]),
    });

    const snapshot = await client.fetchSnapshot();

    expect(snapshot.transactions[1].amount).toBeNull();
    expect(computeNetWorthByMonth(snapshot.transactions, snapshot.accounts, checkingOnly.accountGroups)).toEqual({
      '2024-01': { assets_liquid: 1000 },
      '2024-02': { assets_liquid: 1000 },
    });
  });
});
