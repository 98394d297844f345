import { describe, it, expect, beforeEach } from 'vitest';
import { DispatchPool, type Sleep } from '../../src/services/DispatchPool.js';
import { FailureClassifier } from '../../src/services/FailureClassifier.js';
import { RetryPolicy } from '../../src/services/RetryPolicy.js';
import { createDefaultRegistry } from '../../src/agents/AgentRunnerRegistry.js';
import { createAgentConfig } from '../../src/domain/agent-config.js';
import { RUN_FATAL_REASONS } from '../../src/domain/failure-reasons.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { Question } from '../../src/types/models.js';
import { MockLLMGateway, deferred, fail, httpError, ok } from '../mocks/MockLLMGateway.js';

const question: Question = { id: 'q1', text: 'What is 2+2?', expectedAnswer: '4', metadata: {} };
const config = createAgentConfig('none', 'openai/gpt-4o-mini');

describe('DispatchPool', () => {
  let gateway: MockLLMGateway;
  let logger: ConsoleLogProvider;
  let delays: number[];
  let sleep: Sleep;

  function makePool(concurrency = 2): DispatchPool {
    return new DispatchPool({
      gateway,
      registry: createDefaultRegistry(),
      classifier: new FailureClassifier(),
      retryPolicy: new RetryPolicy({ maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000 }),
      logger,
      concurrency,
      questionTimeoutMs: 5000,
      sleep,
    });
  }

  beforeEach(() => {
    gateway = new MockLLMGateway();
    logger = new ConsoleLogProvider();
    delays = [];
    sleep = async (ms, signal) => {
      delays.push(ms);
      return !signal?.aborted;
    };
  });

  describe('dispatch', () => {
    it('should settle succeeded on the first good response', async () => {
      const settlement = await makePool().dispatch(question, config);

      expect(settlement).toMatchObject({
        status: 'succeeded',
        answer: { text: '42', reasoning: null, raw: '42' },
        attemptCount: 1,
      });
      expect(gateway.calls[0]?.options.timeoutMs).toBe(5000);
    });

    it('should retry transient failures with backoff and then succeed', async () => {
      gateway.setHandler((_call, i) => (i < 2 ? httpError(503) : ok('4')));
      const notices: number[] = [];

      const settlement = await makePool().dispatch(question, config, {
        onRetry: async (n) => {
          notices.push(n.attemptCount);
        },
      });

      expect(settlement).toMatchObject({ status: 'succeeded', attemptCount: 3 });
      expect(delays).toEqual([100, 200]);
      expect(notices).toEqual([1, 2]);
      expect(logger.find('Retrying question')).toHaveLength(2);
    });

    it('should stop at the attempt ceiling with the last reason', async () => {
      gateway.setHandler(() => httpError(429, 'Too Many Requests'));

      const settlement = await makePool().dispatch(question, config);

      expect(settlement).toMatchObject({
        status: 'failed',
        reason: 'rate-limited',
        detail: 'http 429: Too Many Requests',
        attemptCount: 3,
      });
      expect(gateway.calls).toHaveLength(3);
    });

    it('should not retry authentication failures', async () => {
      gateway.setHandler(() => httpError(401, 'No auth credentials found'));

      const settlement = await makePool().dispatch(question, config);

      expect(settlement).toMatchObject({ status: 'failed', reason: 'authentication', attemptCount: 1 });
      expect(delays).toEqual([]);
    });

    it('should treat an unparseable answer as malformed-response and retry once', async () => {
      gateway.setHandler(() => ok('Answer:'));

      const settlement = await makePool().dispatch(question, config);

      expect(settlement).toMatchObject({
        status: 'failed',
        reason: 'malformed-response',
        detail: 'Response contained no answer',
        attemptCount: 2,
      });
    });

    it('should retry a malformed response even after an earlier transient failure', async () => {
      const script = [fail({ kind: 'timeout', message: 'timed out' }), ok('Answer:'), ok('4')];
      gateway.setHandler((_call, i) => script[i] ?? ok('4'));

      const settlement = await makePool().dispatch(question, config);

      expect(settlement).toMatchObject({ status: 'succeeded', answer: { text: '4' }, attemptCount: 3 });
      expect(gateway.calls).toHaveLength(3);
    });

    it('should stop at the second malformed response whatever came before', async () => {
      const script = [fail({ kind: 'timeout', message: 'timed out' }), ok('Answer:'), ok('Answer:')];
      gateway.setHandler((_call, i) => script[i] ?? ok('4'));

      const settlement = await makePool().dispatch(question, config);

      expect(settlement).toMatchObject({ status: 'failed', reason: 'malformed-response', attemptCount: 3 });
      expect(delays).toEqual([100, 200]);
    });

    it('should time latency from the first attempt, not from waiting for a slot', async () => {
      let now = 1000;
      const timed = new DispatchPool({
        gateway,
        registry: createDefaultRegistry(),
        classifier: new FailureClassifier(),
        retryPolicy: new RetryPolicy(),
        logger,
        sleep,
        clock: () => now,
      });
      gateway.setHandler(() => {
        now += 250;
        return ok('4');
      });

      const settlement = await timed.dispatch(question, config, {
        slots: async (fn) => {
          now += 5000;
          return fn();
        },
      });

      expect(settlement).toMatchObject({ status: 'succeeded', latencyMs: 250 });
    });

    it('should continue attempt numbering from priorAttempts', async () => {
      gateway.setHandler(() => httpError(503));

      const settlement = await makePool().dispatch(question, config, { priorAttempts: 2 });

      expect(settlement).toMatchObject({ status: 'failed', reason: 'transient-network', attemptCount: 3 });
      expect(gateway.calls).toHaveLength(1);
    });

    it('should convert a throwing gateway into a question failure', async () => {
      gateway.setHandler(() => {
        throw new Error('boom');
      });

      const settlement = await makePool().dispatch(question, config);

      expect(settlement).toMatchObject({ status: 'failed', reason: 'unknown', attemptCount: 3 });
      expect(logger.find('Unclassified failure')).toHaveLength(3);
    });

    it('should fail with invalid-configuration for an unknown strategy', async () => {
      const settlement = await makePool().dispatch(question, createAgentConfig('debate', 'openai/gpt-4o'));
      expect(settlement).toMatchObject({ status: 'failed', reason: 'invalid-configuration', attemptCount: 1 });
      expect(gateway.calls).toHaveLength(0);
    });

    it('should abandon when stopped during backoff', async () => {
      gateway.setHandler(() => fail({ kind: 'timeout', message: 'timed out' }));
      const stop = new AbortController();
      sleep = async (ms) => {
        delays.push(ms);
        stop.abort();
        return false;
      };

      const settlement = await makePool().dispatch(question, config, { signal: stop.signal });

      expect(settlement).toEqual({ status: 'abandoned', attemptCount: 1 });
      expect(gateway.calls).toHaveLength(1);
    });

    it('should let the in-flight attempt finish after a stop', async () => {
      const gate = deferred<ReturnType<typeof ok>>();
      gateway.setHandler(() => gate.promise);
      const stop = new AbortController();

      const pending = makePool().dispatch(question, config, { signal: stop.signal });
      stop.abort();
      gate.resolve(ok('4'));

      expect(await pending).toMatchObject({ status: 'succeeded', attemptCount: 1 });
    });

    it('should propagate onRetry failures', async () => {
      gateway.setHandler(() => httpError(503));

      await expect(
        makePool().dispatch(question, config, {
          onRetry: async () => {
            throw new Error('store down');
          },
        })
      ).rejects.toThrow('store down');
    });
  });

  describe('runAll', () => {
    const named = (...texts: string[]): Question[] =>
      texts.map((text) => ({ ...question, id: text.toLowerCase(), text }));

    it('should never exceed the concurrency bound', async () => {
      const gates = Array.from({ length: 5 }, () => deferred<ReturnType<typeof ok>>());
      gateway.setHandler((_call, i) => gates[i]?.promise ?? ok('x'));
      const pool = makePool(2);

      const running = pool.runAll(named('A', 'B', 'C', 'D', 'E'), async (q, slots) => {
        await pool.dispatch(q, config, { slots });
      });

      for (const gate of gates) {
        await new Promise((r) => setTimeout(r, 0));
        gate.resolve(ok('x'));
      }

      await expect(running).resolves.toBeUndefined();
      expect(gateway.calls).toHaveLength(5);
      expect(gateway.maxInFlight).toBe(2);
    });

    it('should let other questions run while one is backing off', async () => {
      const backoff = deferred<void>();
      sleep = async (ms) => {
        delays.push(ms);
        await backoff.promise;
        return true;
      };
      gateway.setHandler((call) =>
        call.question.includes('Alpha') && gateway.callsFor('Alpha').length === 1 ? httpError(503) : ok('4')
      );
      const pool = makePool(1);
      const finished: string[] = [];

      await pool.runAll(named('Alpha', 'Beta'), async (q, slots) => {
        const settlement = await pool.dispatch(q, config, { slots });
        finished.push(`${q.id}:${settlement.status}`);
        if (q.id === 'beta') backoff.resolve();
      });

      expect(finished).toEqual(['beta:succeeded', 'alpha:succeeded']);
      expect(gateway.calls.map((c) => c.question.endsWith('Alpha') ? 'alpha' : 'beta')).toEqual([
        'alpha',
        'beta',
        'alpha',
      ]);
      expect(delays).toEqual([100]);
      expect(gateway.maxInFlight).toBe(1);
    });

    it('should report a fatal failure before the next queued request starts', async () => {
      gateway.setHandler((call) => (call.question.endsWith('Alpha') ? httpError(404, 'No endpoints found') : ok('4')));
      const halt = new AbortController();
      const fatal: string[] = [];
      const pool = makePool(1);
      const settlements: Record<string, string> = {};

      await pool.runAll(named('Alpha', 'Beta'), async (q, slots) => {
        const settlement = await pool.dispatch(q, config, {
          slots,
          requestSignal: halt.signal,
          fatalReasons: RUN_FATAL_REASONS,
          onFatal: (reason, detail) => {
            fatal.push(`${reason}: ${detail}`);
            halt.abort();
          },
        });
        settlements[q.id] = settlement.status;
      });

      expect(fatal).toEqual(['invalid-configuration: http 404: No endpoints found']);
      expect(settlements).toEqual({ alpha: 'failed', beta: 'abandoned' });
      expect(gateway.calls).toHaveLength(1);
    });

    it('should not start queued attempts once the signal aborts', async () => {
      const gate = deferred<ReturnType<typeof ok>>();
      gateway.setHandler(() => gate.promise);
      const stop = new AbortController();
      const pool = makePool(1);
      const settlements: Record<string, string> = {};

      const running = pool.runAll(named('Alpha', 'Beta', 'Gamma'), async (q, slots) => {
        const settlement = await pool.dispatch(q, config, { slots, signal: stop.signal });
        settlements[q.id] = `${settlement.status}/${settlement.attemptCount}`;
      });

      await new Promise((r) => setTimeout(r, 0));
      stop.abort();
      gate.resolve(ok('4'));
      await running;

      expect(settlements).toEqual({
        alpha: 'succeeded/1',
        beta: 'abandoned/0',
        gamma: 'abandoned/0',
      });
      expect(gateway.calls).toHaveLength(1);
    });

    it('should finish every started item before rethrowing a worker error', async () => {
      const finished: number[] = [];

      await expect(
        makePool(3).runAll([1, 2, 3], async (n) => {
          if (n === 1) throw new Error('worker failed');
          await new Promise((r) => setTimeout(r, 5));
          finished.push(n);
        })
      ).rejects.toThrow('worker failed');

      expect(finished.sort()).toEqual([2, 3]);
    });

    it('should reject a non-positive concurrency', async () => {
      expect(() => makePool(0)).toThrow(RangeError);
      await expect(makePool().runAll([1], async () => undefined, { concurrency: 0 })).rejects.toThrow(
        'concurrency must be a positive integer'
      );
    });
  });
});
