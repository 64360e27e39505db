/**
 * Failure Scenario Tests
 * Circuit breaker in front of the generation API
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('../../src/observability/logger.js', () => ({
    logger: {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    },
}));

import { CircuitBreaker, CircuitState, CircuitOpenError } from '../../src/services/circuit-breaker.js';

const failingFn = async (): Promise<string> => { throw new Error('Service unavailable'); };
const successFn = async (): Promise<string> => 'success';

async function tripOpen(circuitBreaker: CircuitBreaker): Promise<void> {
    for (let i = 0; i < 3; i++) {
        await circuitBreaker.execute(failingFn).catch(() => undefined);
    }
}

describe('Circuit Breaker', () => {
    let circuitBreaker: CircuitBreaker;

    beforeEach(() => {
        circuitBreaker = new CircuitBreaker({
            name: 'test-circuit',
            failureThreshold: 3,
            resetTimeout: 100, // 100ms for fast tests
            halfOpenRequests: 2,
        });
    });

    describe('State Transitions', () => {
        it('should start in CLOSED state', () => {
            expect(circuitBreaker.getState()).toBe(CircuitState.CLOSED);
        });

        it('should open after failure threshold is reached', async () => {
            await tripOpen(circuitBreaker);

            expect(circuitBreaker.getState()).toBe(CircuitState.OPEN);
        });

        it('should fail fast without calling the dependency when open', async () => {
            await tripOpen(circuitBreaker);
            const dependency = vi.fn(successFn);

            await expect(circuitBreaker.execute(dependency)).rejects.toThrow(CircuitOpenError);
            expect(dependency).not.toHaveBeenCalled();
        });

        it('should transition to HALF_OPEN after reset timeout', async () => {
            await tripOpen(circuitBreaker);

            await new Promise(resolve => setTimeout(resolve, 150));

            expect(circuitBreaker.getState()).toBe(CircuitState.HALF_OPEN);
        });

        it('should close after successful half-open probes', async () => {
            await tripOpen(circuitBreaker);
            await new Promise(resolve => setTimeout(resolve, 150));

            await circuitBreaker.execute(successFn);
            await circuitBreaker.execute(successFn);

            expect(circuitBreaker.getState()).toBe(CircuitState.CLOSED);
        });

        it('should close on the first successful probe', async () => {
            await tripOpen(circuitBreaker);
            await new Promise(resolve => setTimeout(resolve, 150));

            await circuitBreaker.execute(successFn);

            expect(circuitBreaker.getState()).toBe(CircuitState.CLOSED);
        });

        it('should turn away calls beyond the half-open probe slots', async () => {
            const breaker = new CircuitBreaker({
                name: 'single-probe',
                failureThreshold: 1,
                resetTimeout: 50,
                halfOpenRequests: 1,
            });
            await breaker.execute(failingFn).catch(() => undefined);
            await new Promise(resolve => setTimeout(resolve, 80));

            let finishProbe: (value: string) => void = () => undefined;
            const probe = breaker.execute(() => new Promise<string>(resolve => { finishProbe = resolve; }));
            const dependency = vi.fn(successFn);

            await expect(breaker.execute(dependency)).rejects.toThrow(CircuitOpenError);
            expect(dependency).not.toHaveBeenCalled();

            finishProbe('recovered');
            await expect(probe).resolves.toBe('recovered');
            expect(breaker.getState()).toBe(CircuitState.CLOSED);
        });

        it('should reopen on failure during half-open', async () => {
            await tripOpen(circuitBreaker);
            await new Promise(resolve => setTimeout(resolve, 150));

            await circuitBreaker.execute(failingFn).catch(() => undefined);

            expect(circuitBreaker.getState()).toBe(CircuitState.OPEN);
        });
    });

    describe('Success Path', () => {
        it('should reset failure count on success', async () => {
            await circuitBreaker.execute(failingFn).catch(() => undefined);
            await circuitBreaker.execute(failingFn).catch(() => undefined);

            await circuitBreaker.execute(successFn);

            await circuitBreaker.execute(failingFn).catch(() => undefined);
            await circuitBreaker.execute(failingFn).catch(() => undefined);

            expect(circuitBreaker.getState()).toBe(CircuitState.CLOSED);
        });

        it('should pass through the wrapped result', async () => {
            await expect(circuitBreaker.execute(successFn)).resolves.toBe('success');
        });
    });

    describe('reset', () => {
        it('should force reset to CLOSED', async () => {
            await tripOpen(circuitBreaker);
            expect(circuitBreaker.getState()).toBe(CircuitState.OPEN);

            circuitBreaker.reset();

            expect(circuitBreaker.getState()).toBe(CircuitState.CLOSED);
        });
    });
});
