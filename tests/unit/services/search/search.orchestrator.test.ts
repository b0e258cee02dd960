/**
 * Search orchestrator tests
 */

import { SearchOrchestrator, deduplicateRecords } from '../../../../src/services/search/search.orchestrator';
import { PollResult } from '../../../../src/services/search/provider.interface';
import { parseTarget } from '../../../../src/models/target.model';
import * as concurrency from '../../../../src/utils/concurrency';
import { RateLimiter } from '../../../../src/utils/concurrency';
import { PollingConfig } from '../../../../src/config/schema';
import { ProviderHttpError, SearchFailure } from '../../../../src/utils/errors';
import { ScriptedSearchProvider, makeRecord } from '../../../integration/mocks/search.mocks';
import { FIXED_NOW, fixedClock } from '../../../integration/mocks/config.mocks';

function orchestrator(
  provider: ScriptedSearchProvider,
  maxWaitMs = 200,
  polling: Partial<PollingConfig> = {}
): SearchOrchestrator {
  return new SearchOrchestrator({
    provider,
    limiter: new RateLimiter('search', { maxConcurrent: 2, minIntervalMs: 0 }),
    polling: { initialIntervalMs: 1, maxIntervalMs: 4, maxWaitMs, ...polling },
    retry: { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 2 },
    maxRecords: 50,
    timeoutSeconds: 5,
    buckets: ['leaks.public.general'],
    clock: fixedClock,
  });
}

describe('SearchOrchestrator', () => {
  const target = parseTarget('example.com');

  it('should submit, poll until complete and return the records', async () => {
    const provider = new ScriptedSearchProvider({
      sessionId: 'search-9',
      polls: [{ status: 'Pending' }, { status: 'Complete', records: [makeRecord('a'), makeRecord('b')] }],
    });

    const result = await orchestrator(provider).resolve(target);

    expect(result.session).toEqual({ id: 'search-9', status: 'Complete', createdAt: FIXED_NOW });
    expect(result.records.map(record => record.id)).toEqual(['a', 'b']);
    expect(provider.submit).toHaveBeenCalledWith(target, {
      maxResults: 50,
      timeoutSeconds: 5,
      buckets: ['leaks.public.general'],
    });
    expect(provider.poll).toHaveBeenCalledTimes(2);
    expect(provider.poll).toHaveBeenCalledWith('search-9');
  });

  it('should return an empty list for a session without results', async () => {
    const provider = new ScriptedSearchProvider({ polls: [{ status: 'Complete' }] });

    const result = await orchestrator(provider).resolve(target);

    expect(result.records).toEqual([]);
  });

  it('should deduplicate records by id', async () => {
    const provider = new ScriptedSearchProvider({
      polls: [
        {
          status: 'Complete',
          records: [makeRecord('a', { source: 'first' }), makeRecord('b'), makeRecord('a', { source: 'second' })],
        },
      ],
    });

    const result = await orchestrator(provider).resolve(target);

    expect(result.records.map(record => [record.id, record.source])).toEqual([
      ['a', 'second'],
      ['b', 'b.txt'],
    ]);
  });

  it('should fail as Unauthorized without polling when the key is rejected', async () => {
    const provider = new ScriptedSearchProvider();
    provider.submit.mockRejectedValue(new ProviderHttpError('scripted', 'Invalid or unauthorized API key', 401));

    const resolution = orchestrator(provider).resolve(target);

    await expect(resolution).rejects.toBeInstanceOf(SearchFailure);
    await expect(resolution).rejects.toMatchObject({ kind: 'Unauthorized' });
    expect(provider.submit).toHaveBeenCalledTimes(1);
    expect(provider.poll).not.toHaveBeenCalled();
  });

  it('should fail with the provider message when the session fails', async () => {
    const provider = new ScriptedSearchProvider({ polls: [{ status: 'Failed', message: 'quota exhausted' }] });

    await expect(orchestrator(provider).resolve(target)).rejects.toThrow(
      'Search failed (ProviderError): quota exhausted'
    );
  });

  it('should retry a transient poll error', async () => {
    const provider = new ScriptedSearchProvider({ polls: [{ status: 'Complete', records: [makeRecord('a')] }] });
    provider.poll.mockRejectedValueOnce(new ProviderHttpError('scripted', 'Service Unavailable', 503));

    const result = await orchestrator(provider).resolve(target);

    expect(result.records).toHaveLength(1);
    expect(provider.poll).toHaveBeenCalledTimes(2);
  });

  it('should give up after the retry budget', async () => {
    const provider = new ScriptedSearchProvider();
    provider.submit.mockRejectedValue(new ProviderHttpError('scripted', 'Bad Gateway', 502));

    await expect(orchestrator(provider).resolve(target)).rejects.toMatchObject({ kind: 'ProviderError' });
    expect(provider.submit).toHaveBeenCalledTimes(2);
  });

  it('should time out and cancel a session that never completes', async () => {
    const pending: PollResult = { status: 'Pending' };
    const provider = new ScriptedSearchProvider({ sessionId: 'slow', polls: [pending] });

    const resolution = orchestrator(provider, 20).resolve(target);

    await expect(resolution).rejects.toMatchObject({ kind: 'Timeout', sessionId: 'slow' });
    expect(provider.cancel).toHaveBeenCalledWith('slow');
  });
});

describe('SearchOrchestrator polling schedule', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should start at the initial interval, double it and cap it at the maximum', async () => {
    const waits = jest.spyOn(concurrency, 'sleep').mockResolvedValue(undefined);
    const provider = new ScriptedSearchProvider({
      polls: [
        { status: 'Pending' },
        { status: 'Pending' },
        { status: 'Pending' },
        { status: 'Pending' },
        { status: 'Pending' },
        { status: 'Complete', records: [] },
      ],
    });

    await orchestrator(provider, 600_000, { initialIntervalMs: 100, maxIntervalMs: 500 }).resolve(
      parseTarget('example.com')
    );

    expect(waits.mock.calls.map(([ms]) => ms)).toEqual([100, 200, 400, 500, 500, 500]);
    expect(provider.poll).toHaveBeenCalledTimes(6);
  });

  it('should stop polling and cancel once the run deadline aborts', async () => {
    const provider = new ScriptedSearchProvider({ sessionId: 'search-5', polls: [{ status: 'Pending' }] });
    const deadline = new AbortController();
    provider.poll.mockImplementationOnce(async () => {
      deadline.abort();
      return { status: 'Pending' };
    });

    const resolution = orchestrator(provider, 60_000).resolve(parseTarget('example.com'), deadline.signal);

    await expect(resolution).rejects.toMatchObject({
      kind: 'Timeout',
      reason: 'Run deadline reached before the search completed',
      sessionId: 'search-5',
    });
    expect(provider.poll).toHaveBeenCalledTimes(1);
    expect(provider.cancel).toHaveBeenCalledWith('search-5');
  });
});

describe('deduplicateRecords', () => {
  it('should keep the first position and the last fields', () => {
    const records = [
      makeRecord('x', { sizeBytes: 1 }),
      makeRecord('y'),
      makeRecord('x', { sizeBytes: 2 }),
      makeRecord('z'),
    ];

    expect(deduplicateRecords(records).map(record => [record.id, record.sizeBytes])).toEqual([
      ['x', 2],
      ['y', 1024],
      ['z', 1024],
    ]);
  });
});
